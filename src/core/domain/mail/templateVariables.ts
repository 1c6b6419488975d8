/**
 * Project: Mail Dispatch Worker
 * File: src/core/domain/mail/templateVariables.ts
 * Summary: Value shapes used while resolving and rendering template variables.
 */

export type TemplateScalar = string | number | boolean | null;

// Values other than strings and nested mappings are carried through untouched.
export type TemplateValue = TemplateScalar | TemplateVariables;

export interface TemplateVariables {
  [key: string]: TemplateValue;
}

export const isTemplateMapping = (value: unknown): value is TemplateVariables =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const stableStringify = (value: TemplateVariables): string => JSON.stringify(value);

export const stringifyTemplateValue = (value: TemplateValue): string => {
  if (isTemplateMapping(value)) {
    return stableStringify(value);
  }

  return String(value);
};

/**
 * Ordered-override merge: every source is applied in turn, so a key present in a later
 * source replaces the value from an earlier one. Sources are never mutated.
 */
export const mergeVariables = (...sources: TemplateVariables[]): TemplateVariables => {
  const merged: TemplateVariables = {};

  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      merged[key] = value;
    }
  }

  return merged;
};

export const omitVariables = (
  source: TemplateVariables,
  keys: Iterable<string>,
): TemplateVariables => {
  const excluded = new Set(keys);
  const result: TemplateVariables = {};

  for (const [key, value] of Object.entries(source)) {
    if (!excluded.has(key)) {
      result[key] = value;
    }
  }

  return result;
};
