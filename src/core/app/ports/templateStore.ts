import type { TemplateVariables } from '@core/domain';

export interface TemplateStore {
  /** Returns the HTML body for `templateName`, or `null` when no source has it. */
  loadTemplate(templateName: string): Promise<string | null>;
  /** Returns the default content values, override keys merged over bundled ones. */
  loadTemplateValues(templateName: string): Promise<TemplateVariables>;
}
