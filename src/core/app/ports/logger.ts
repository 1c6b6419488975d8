export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerContext = {
  /** Broker delivery tag of the message being handled, when there is one. */
  deliveryTag?: number;
  /** Logical component emitting the entry (e.g. `consumer`, `mailer`). */
  component?: string;
  /** Machine friendly event name for querying (e.g. `consumer.message.acked`). */
  event?: string;
  /** Duration of the operation in milliseconds when applicable. */
  durationMs?: number;
  /** Outcome keyword such as `success`, `failure`, or `skipped`. */
  outcome?: string;
  /**
   * SHA-256 hash of the recipient address. Never log the address itself.
   */
  emailHash?: string;
  /** Optional error instance or metadata to serialise. */
  error?: unknown;
  /** Additional structured properties to enrich the log entry. */
  [key: string]: unknown;
};

export interface Logger {
  debug(message: string, context?: LoggerContext): void;
  info(message: string, context?: LoggerContext): void;
  warn(message: string, context?: LoggerContext): void;
  error(message: string, context?: LoggerContext): void;
  withContext(context: LoggerContext): Logger;
}
