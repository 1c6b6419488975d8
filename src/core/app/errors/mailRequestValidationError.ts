export type MailRequestIssue = {
  path: string;
  message: string;
};

export class MailRequestValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: MailRequestIssue[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MailRequestValidationError';
  }
}
