/**
 * Project: Mail Dispatch Worker
 * File: src/core/app/templates/variableResolver.ts
 * Summary: Fixed-point substitution of `{key}` references between template variables.
 */

import {
  isTemplateMapping,
  mergeVariables,
  stringifyTemplateValue,
  type TemplateValue,
  type TemplateVariables,
} from '@core/domain';

export const DEFAULT_MAX_RESOLUTION_PASSES = 3;

export type ResolveVariableReferencesOptions = {
  maxIterations?: number;
  /**
   * Outer scope visible to the variables being resolved. Nested mappings receive their
   * parent's context plus their siblings, so `{app_name}` works at any depth.
   */
  context?: TemplateVariables;
};

const substituteReferences = (
  value: string,
  ownKey: string,
  lookup: TemplateVariables,
): string => {
  let result = value;

  for (const [candidateKey, candidateValue] of Object.entries(lookup)) {
    if (candidateKey === ownKey) {
      continue;
    }

    const placeholder = `{${candidateKey}}`;
    if (result.includes(placeholder)) {
      result = result.split(placeholder).join(stringifyTemplateValue(candidateValue));
    }
  }

  return result;
};

const valuesEqual = (left: TemplateValue, right: TemplateValue): boolean => {
  if (isTemplateMapping(left) && isTemplateMapping(right)) {
    const leftKeys = Object.keys(left);
    if (leftKeys.length !== Object.keys(right).length) {
      return false;
    }

    return leftKeys.every((key) => key in right && valuesEqual(left[key], right[key]));
  }

  return left === right;
};

export const resolveVariableReferences = (
  variables: TemplateVariables,
  options: ResolveVariableReferencesOptions = {},
): TemplateVariables => {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_RESOLUTION_PASSES;
  const context = options.context ?? {};
  const working = mergeVariables(variables);

  for (let pass = 0; pass < maxIterations; pass += 1) {
    // Every entry in a pass sees the values as they were when the pass started.
    const lookup = mergeVariables(context, working);
    let changed = false;

    for (const [key, value] of Object.entries(working)) {
      if (typeof value === 'string') {
        const substituted = substituteReferences(value, key, lookup);
        if (substituted !== value) {
          working[key] = substituted;
          changed = true;
        }
        continue;
      }

      if (isTemplateMapping(value)) {
        const nested = resolveVariableReferences(value, { maxIterations: 1, context: lookup });
        if (!valuesEqual(nested, value)) {
          working[key] = nested;
          changed = true;
        }
      }
    }

    if (!changed) {
      break;
    }
  }

  return working;
};
