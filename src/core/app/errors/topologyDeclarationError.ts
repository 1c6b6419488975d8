export class TopologyDeclarationError extends Error {
  constructor(
    public readonly queue: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to declare queue '${queue}'.`, options);
    this.name = 'TopologyDeclarationError';
  }
}
