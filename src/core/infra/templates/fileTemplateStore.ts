/**
 * Project: Mail Dispatch Worker
 * File: src/core/infra/templates/fileTemplateStore.ts
 * Summary: Load HTML templates and their default values from the bundled directory, with an
 * optional deployment directory taking precedence.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  isTemplateMapping,
  mergeVariables,
  type TemplateValue,
  type TemplateVariables,
} from '@core/domain';
import type { Logger, TemplateStore } from '@core/app';

export const BUNDLED_TEMPLATES_DIRECTORY = fileURLToPath(
  new URL('../../../../templates/', import.meta.url),
);

// Dot-separated segments (`newsletter.v2`); no separators, no empty or dot-only segments.
const TEMPLATE_NAME_PATTERN = /^[A-Za-z0-9_-]+(?:\.[A-Za-z0-9_-]+)*$/u;

export type FileTemplateStoreOptions = {
  defaultDirectory?: string;
  overrideDirectory?: string | null;
};

const isMissingFileError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

const toTemplateValue = (value: unknown): TemplateValue | undefined => {
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value === null
  ) {
    return value;
  }

  if (isTemplateMapping(value)) {
    return toTemplateVariables(value);
  }

  return undefined;
};

// JSON arrays have no place in a variable set and are dropped.
const toTemplateVariables = (source: object): TemplateVariables => {
  const variables: TemplateVariables = {};

  for (const [key, value] of Object.entries(source)) {
    const converted = toTemplateValue(value);
    if (converted !== undefined) {
      variables[key] = converted;
    }
  }

  return variables;
};

export class FileTemplateStore implements TemplateStore {
  private readonly defaultDirectory: string;

  private readonly overrideDirectory: string | null;

  constructor(
    private readonly logger: Logger,
    options: FileTemplateStoreOptions = {},
  ) {
    this.defaultDirectory = options.defaultDirectory ?? BUNDLED_TEMPLATES_DIRECTORY;
    this.overrideDirectory = options.overrideDirectory ?? null;
  }

  async loadTemplate(templateName: string): Promise<string | null> {
    if (!this.isValidName(templateName)) {
      return null;
    }

    const fileName = `${templateName}.html`;

    if (this.overrideDirectory) {
      const override = await this.readSource(join(this.overrideDirectory, fileName));
      if (override !== null) {
        return override;
      }
    }

    const bundled = await this.readSource(join(this.defaultDirectory, fileName));
    if (bundled === null) {
      this.logger.warn(`Template not found: ${templateName}`, {
        event: 'templates.html.not_found',
        outcome: 'skipped',
        templateName,
      });
    }

    return bundled;
  }

  async loadTemplateValues(templateName: string): Promise<TemplateVariables> {
    if (!this.isValidName(templateName)) {
      return {};
    }

    const fileName = `${templateName}.json`;
    const defaults = await this.readValues(join(this.defaultDirectory, fileName));

    if (!this.overrideDirectory) {
      return defaults;
    }

    const overrides = await this.readValues(join(this.overrideDirectory, fileName));
    return mergeVariables(defaults, overrides);
  }

  private isValidName(templateName: string): boolean {
    if (TEMPLATE_NAME_PATTERN.test(templateName)) {
      return true;
    }

    this.logger.warn('Rejected template name with unsupported characters.', {
      event: 'templates.name.rejected',
      outcome: 'skipped',
      templateName,
    });
    return false;
  }

  private async readSource(filePath: string): Promise<string | null> {
    try {
      const content = await readFile(filePath, 'utf8');
      this.logger.debug(`Loaded template source ${filePath}.`, {
        event: 'templates.source.loaded',
        filePath,
      });
      return content;
    } catch (error) {
      if (!isMissingFileError(error)) {
        this.logger.error(`Failed to read template source ${filePath}.`, {
          event: 'templates.source.read_failed',
          outcome: 'failure',
          filePath,
          error,
        });
      }
      return null;
    }
  }

  private async readValues(filePath: string): Promise<TemplateVariables> {
    const content = await this.readSource(filePath);
    if (content === null) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.error(`Template values in ${filePath} are not valid JSON.`, {
        event: 'templates.values.parse_failed',
        outcome: 'failure',
        filePath,
        error,
      });
      return {};
    }

    if (!isTemplateMapping(parsed)) {
      this.logger.warn(`Template values in ${filePath} must be a JSON object.`, {
        event: 'templates.values.invalid_shape',
        outcome: 'skipped',
        filePath,
      });
      return {};
    }

    return toTemplateVariables(parsed);
  }
}
