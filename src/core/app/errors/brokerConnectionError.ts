export class BrokerConnectionError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BrokerConnectionError';
  }
}
