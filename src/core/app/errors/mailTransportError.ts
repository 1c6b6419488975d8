export type MailTransportFailureReason =
  | 'network-unreachable'
  | 'connection-refused'
  | 'delivery-failed';

export class MailTransportError extends Error {
  constructor(
    message: string,
    public readonly reason: MailTransportFailureReason,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MailTransportError';
  }
}
