/**
 * Project: Mail Dispatch Worker
 * File: src/core/app/services/mail/decodeMailRequest.ts
 * Summary: Decode a raw queue message body into a validated mail request.
 */

import { z } from 'zod';

import type { MailRequest } from '@core/domain';
import {
  MailRequestValidationError,
  type MailRequestIssue,
} from '@core/app/errors/mailRequestValidationError';

const requiredString = (field: string) =>
  z
    .string({
      required_error: `${field} is required.`,
      invalid_type_error: `${field} must be a string.`,
    })
    .trim()
    .min(1, `${field} must not be empty.`);

const optionalString = (field: string) =>
  z
    .string({ invalid_type_error: `${field} must be a string.` })
    .nullish()
    .transform((value) => value ?? undefined);

const mailRequestSchema = z.object({
  template_name: requiredString('template_name'),
  username: requiredString('username'),
  recipient: requiredString('recipient'),
  verification_code: optionalString('verification_code'),
  subject: optionalString('subject'),
});

const normaliseZodIssues = (issues: z.ZodIssue[]): MailRequestIssue[] =>
  issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));

export const decodeMailRequest = (body: Buffer | string): MailRequest => {
  const text = typeof body === 'string' ? body : body.toString('utf8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new MailRequestValidationError('Message body must be valid JSON.', [], {
      cause: error,
    });
  }

  const parsed = mailRequestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MailRequestValidationError(
      'Mail request payload is invalid.',
      normaliseZodIssues(parsed.error.issues),
    );
  }

  const request: MailRequest = {
    template_name: parsed.data.template_name,
    username: parsed.data.username,
    recipient: parsed.data.recipient,
  };

  if (parsed.data.verification_code !== undefined) {
    request.verification_code = parsed.data.verification_code;
  }

  if (parsed.data.subject !== undefined) {
    request.subject = parsed.data.subject;
  }

  return request;
};
