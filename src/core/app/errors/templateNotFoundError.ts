export class TemplateNotFoundError extends Error {
  constructor(public readonly templateName: string) {
    super(`Template '${templateName}' not found.`);
    this.name = 'TemplateNotFoundError';
  }
}
