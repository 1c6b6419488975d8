/**
 * Project: Mail Dispatch Worker
 * File: src/core/app/services/mail/mailDispatchService.ts
 * Summary: Turn mail requests into rendered messages and hand them to the mailer.
 */

import {
  BRANDING_VARIABLE_KEYS,
  brandingToVariables,
  isCodeTemplate,
  mergeVariables,
  omitVariables,
  type BrandingConfig,
  type MailRequest,
  type TemplateVariables,
} from '@core/domain';
import type { Logger } from '@core/app/ports/logger';
import type { MailerPort } from '@core/app/ports/mailer';
import type { TemplateStore } from '@core/app/ports/templateStore';
import { MailRequestValidationError } from '@core/app/errors/mailRequestValidationError';
import { TemplateNotFoundError } from '@core/app/errors/templateNotFoundError';
import { renderTemplate } from '@core/app/templates/renderTemplate';
import { resolveVariableReferences } from '@core/app/templates/variableResolver';

import { hashEmail } from './emailFingerprint';

export const DEFAULT_CUSTOM_SUBJECT = 'No Subject';

const SUBJECT_VARIABLE_KEY = 'subject';

export type SendHtmlMailInput = {
  templateName: string;
  variables: TemplateVariables;
  subject: string;
  recipient: string;
};

export type SendPlainTextMailInput = {
  content: string;
  subject: string;
  recipient: string;
};

export type MailDispatchServiceOptions = {
  branding: BrandingConfig;
};

const fallbackCodeSubject = (verificationCode: string) =>
  `Your verification code is ${verificationCode}`;

// A blank subject on the request counts as no subject.
const requestedSubject = (request: MailRequest): string | undefined =>
  request.subject !== undefined && request.subject.trim().length > 0
    ? request.subject
    : undefined;

export class MailDispatchService {
  constructor(
    private readonly templateStore: TemplateStore,
    private readonly mailer: MailerPort,
    private readonly logger: Logger,
    private readonly options: MailDispatchServiceOptions,
  ) {}

  async dispatch(request: MailRequest): Promise<void> {
    if (isCodeTemplate(request.template_name)) {
      await this.sendCodeMail(request);
      return;
    }

    await this.sendCustomTemplateMail(request);
  }

  async sendCodeMail(request: MailRequest): Promise<void> {
    const verificationCode = request.verification_code?.trim() ?? '';
    if (verificationCode.length === 0) {
      throw new MailRequestValidationError(
        `Template '${request.template_name}' requires a verification code.`,
        [{ path: 'verification_code', message: 'verification_code is required.' }],
      );
    }

    const variables = await this.buildVariableSet(request.template_name, {
      username: request.username,
      verification_code: verificationCode,
    });

    const subject =
      requestedSubject(request) ??
      this.resolveSubject(variables) ??
      fallbackCodeSubject(verificationCode);

    await this.sendHtml({
      templateName: request.template_name,
      variables,
      subject,
      recipient: request.recipient,
    });
  }

  async sendCustomTemplateMail(request: MailRequest): Promise<void> {
    const variables = await this.buildVariableSet(request.template_name, {
      username: request.username,
    });

    await this.sendHtml({
      templateName: request.template_name,
      variables,
      subject: requestedSubject(request) ?? DEFAULT_CUSTOM_SUBJECT,
      recipient: request.recipient,
    });
  }

  async sendHtml(input: SendHtmlMailInput): Promise<void> {
    const templateContent = await this.templateStore.loadTemplate(input.templateName);
    if (templateContent === null) {
      this.logger.warn('Mail template could not be found.', {
        event: 'mail.template.not_found',
        outcome: 'failure',
        templateName: input.templateName,
      });
      throw new TemplateNotFoundError(input.templateName);
    }

    const html = renderTemplate(templateContent, input.variables, this.options.branding);

    await this.mailer.send({
      to: { email: input.recipient },
      subject: input.subject,
      html,
    });

    this.logger.info('Templated mail handed to mailer.', {
      event: 'mail.html.sent',
      outcome: 'success',
      templateName: input.templateName,
      emailHash: hashEmail(input.recipient),
    });
  }

  async sendPlainText(input: SendPlainTextMailInput): Promise<void> {
    await this.mailer.send({
      to: { email: input.recipient },
      subject: input.subject,
      text: input.content,
    });

    this.logger.info('Plain text mail handed to mailer.', {
      event: 'mail.plain.sent',
      outcome: 'success',
      emailHash: hashEmail(input.recipient),
    });
  }

  /**
   * Stored defaults lose to branding keys, and both lose to the per-request values.
   */
  private async buildVariableSet(
    templateName: string,
    dynamic: TemplateVariables,
  ): Promise<TemplateVariables> {
    const defaults = await this.templateStore.loadTemplateValues(templateName);

    return mergeVariables(
      omitVariables(defaults, BRANDING_VARIABLE_KEYS),
      brandingToVariables(this.options.branding),
      dynamic,
    );
  }

  private resolveSubject(variables: TemplateVariables): string | undefined {
    const template = variables[SUBJECT_VARIABLE_KEY];
    if (typeof template !== 'string' || template.trim().length === 0) {
      return undefined;
    }

    const resolved = resolveVariableReferences(variables)[SUBJECT_VARIABLE_KEY];
    return typeof resolved === 'string' ? resolved : undefined;
  }
}
