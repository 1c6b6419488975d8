import {
  brandingToVariables,
  mergeVariables,
  stringifyTemplateValue,
  type BrandingConfig,
  type TemplateVariables,
} from '@core/domain';

import { resolveVariableReferences } from './variableResolver';

/**
 * Replaces `{{key}}` tokens in `templateContent`. Request variables win over branding on a
 * key collision; tokens without a matching variable are left in the output as-is.
 */
export const renderTemplate = (
  templateContent: string,
  variables: TemplateVariables,
  branding: BrandingConfig,
): string => {
  const resolved = resolveVariableReferences(
    mergeVariables(brandingToVariables(branding), variables),
  );

  let rendered = templateContent;

  for (const [key, value] of Object.entries(resolved)) {
    const token = `{{${key}}}`;
    if (rendered.includes(token)) {
      rendered = rendered.split(token).join(stringifyTemplateValue(value));
    }
  }

  return rendered;
};
