export type DeadLetterNames = {
  exchange: string;
  queue: string;
};

// Fixed naming convention; operators reading the dead-letter queue rely on it.
export const deadLetterNames = (queueName: string): DeadLetterNames => ({
  exchange: `${queueName}_dlx`,
  queue: `${queueName}_dlq`,
});
