/**
 * Project: Mail Dispatch Worker
 * File: src/core/domain/mail/mailRequest.ts
 * Summary: Inbound mail-send request contract and the built-in template names.
 */

export type MailRequest = {
  template_name: string;
  username: string;
  recipient: string;
  verification_code?: string;
  subject?: string;
};

export const TemplateName = {
  EMAIL_VERIFICATION: 'email_verification',
  EMAIL_CHANGE_VERIFICATION: 'email_change_verification',
  FORGOT_PASSWORD_VERIFICATION: 'forgot_password_verification',
} as const;

export type CodeTemplateName = (typeof TemplateName)[keyof typeof TemplateName];

export const CODE_TEMPLATE_NAMES: readonly CodeTemplateName[] = [
  TemplateName.EMAIL_VERIFICATION,
  TemplateName.EMAIL_CHANGE_VERIFICATION,
  TemplateName.FORGOT_PASSWORD_VERIFICATION,
];

export const isCodeTemplate = (templateName: string): templateName is CodeTemplateName =>
  CODE_TEMPLATE_NAMES.some((name) => name === templateName);
