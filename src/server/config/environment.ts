/**
 * Filename: src/server/config/environment.ts
 * Purpose: Parse and validate process environment variables into strongly typed configuration objects.
 * License: MIT
 */

import { createBrandingConfig, type BrandingConfig } from '@core/domain';

import { looksLikeEmail, parseBooleanFlagValue, type EnvIssue } from './envFile';

export type BrokerConfig = Readonly<{
  host: string;
  port: number;
  queueName: string;
  username: string;
  password: string;
  heartbeatSeconds: number;
  connectMaxAttempts: number;
  connectRetryDelayMs: number;
  blockedConnectionTimeoutMs: number;
}>;

export type SmtpConfig = Readonly<{
  host: string;
  port: number;
  user: string;
  password: string;
}>;

export type EnvironmentConfig = Readonly<{
  broker: BrokerConfig;
  smtp: SmtpConfig;
  branding: BrandingConfig;
  templates: Readonly<{ overrideDirectory: string | null }>;
  mail: Readonly<{ dryRun: boolean }>;
}>;

export class EnvironmentValidationError extends Error {
  constructor(public readonly issues: EnvIssue[]) {
    super(
      `Environment configuration is invalid: ${issues.map((issue) => issue.key).join(', ')}.`,
    );
    this.name = 'EnvironmentValidationError';
  }
}

type Env = Record<string, string | undefined>;

const booleanErrorMessage = (key: string) => `${key} must be set to "true" or "false".`;

const readOptional = (env: Env, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value && value.length > 0 ? value : undefined;
};

// Missing values are recorded as issues; the empty string returned is never used because
// parsing fails as a whole when any issue exists.
const readRequired = (env: Env, key: string, issues: EnvIssue[]): string => {
  const value = readOptional(env, key);
  if (value === undefined) {
    issues.push({ key, message: `${key} is required.` });
    return '';
  }

  return value;
};

const readInteger = (
  env: Env,
  key: string,
  issues: EnvIssue[],
  defaultValue: number,
  bounds: { min: number; max?: number },
): number => {
  const raw = readOptional(env, key);
  if (raw === undefined) {
    return defaultValue;
  }

  const parsed = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
  const withinBounds =
    Number.isSafeInteger(parsed) &&
    parsed >= bounds.min &&
    (bounds.max === undefined || parsed <= bounds.max);

  if (!withinBounds) {
    const range = bounds.max === undefined ? `>= ${bounds.min}` : `${bounds.min}-${bounds.max}`;
    issues.push({ key, message: `${key} must be an integer in the range ${range}.` });
    return defaultValue;
  }

  return parsed;
};

const readBooleanFlag = (
  env: Env,
  key: string,
  issues: EnvIssue[],
  defaultValue: boolean,
): boolean => {
  const raw = readOptional(env, key);
  if (raw === undefined) {
    return defaultValue;
  }

  const parsed = parseBooleanFlagValue(raw);
  if (parsed === null) {
    issues.push({ key, message: booleanErrorMessage(key) });
    return defaultValue;
  }

  return parsed;
};

const PORT_BOUNDS = { min: 1, max: 65_535 };

const parseBroker = (env: Env, issues: EnvIssue[]): BrokerConfig => ({
  host: readOptional(env, 'RABBITMQ_HOST') ?? 'localhost',
  port: readInteger(env, 'RABBITMQ_PORT', issues, 5672, PORT_BOUNDS),
  queueName: readRequired(env, 'RABBITMQ_MAIL_QUEUE_NAME', issues),
  username: readRequired(env, 'RABBITMQ_USERNAME', issues),
  password: readRequired(env, 'RABBITMQ_PASSWORD', issues),
  heartbeatSeconds: readInteger(env, 'RABBITMQ_HEARTBEAT', issues, 0, { min: 0 }),
  connectMaxAttempts: readInteger(env, 'RABBITMQ_CONNECT_MAX_ATTEMPTS', issues, 10, { min: 1 }),
  connectRetryDelayMs: readInteger(env, 'RABBITMQ_CONNECT_RETRY_DELAY_MS', issues, 5_000, {
    min: 0,
  }),
  blockedConnectionTimeoutMs:
    readInteger(env, 'RABBITMQ_BLOCKED_TIMEOUT_SECONDS', issues, 300, { min: 1 }) * 1_000,
});

const parseSmtp = (env: Env, issues: EnvIssue[]): SmtpConfig => ({
  host: readOptional(env, 'SMTP_SERVER') ?? 'localhost',
  port: readInteger(env, 'SMTP_PORT', issues, 587, PORT_BOUNDS),
  user: readRequired(env, 'SMTP_USER', issues),
  password: readRequired(env, 'SMTP_PASSWORD', issues),
});

const parseBranding = (env: Env, issues: EnvIssue[]): BrandingConfig => {
  const contactEmail = readRequired(env, 'CONTACT_EMAIL', issues);
  if (contactEmail.length > 0 && !looksLikeEmail(contactEmail)) {
    issues.push({ key: 'CONTACT_EMAIL', message: 'CONTACT_EMAIL must be an email address.' });
  }

  return createBrandingConfig({
    appName: readRequired(env, 'APP_NAME', issues),
    appOwner: readRequired(env, 'APP_OWNER', issues),
    contactEmail,
    logoUrl: readOptional(env, 'LOGO_URL'),
    primaryColor: readOptional(env, 'PRIMARY_COLOR'),
    primaryShadeColor: readOptional(env, 'PRIMARY_SHADE_COLOR'),
    primaryForegroundColor: readOptional(env, 'PRIMARY_FOREGROUND_COLOR'),
  });
};

const dedupeIssues = (issues: EnvIssue[]): EnvIssue[] => {
  const seen = new Map<string, EnvIssue>();

  for (const issue of issues) {
    if (!seen.has(issue.key)) {
      seen.set(issue.key, issue);
    }
  }

  return Array.from(seen.values());
};

export const parseEnvironment = (env: Env): EnvironmentConfig => {
  const issues: EnvIssue[] = [];

  const broker = parseBroker(env, issues);
  const smtp = parseSmtp(env, issues);
  const branding = parseBranding(env, issues);
  const overrideDirectory = readOptional(env, 'EMAIL_TEMPLATES_DIR') ?? null;
  const dryRun = readBooleanFlag(env, 'MAIL_DRY_RUN', issues, false);

  if (issues.length > 0) {
    throw new EnvironmentValidationError(dedupeIssues(issues));
  }

  return Object.freeze({
    broker: Object.freeze(broker),
    smtp: Object.freeze(smtp),
    branding,
    templates: Object.freeze({ overrideDirectory }),
    mail: Object.freeze({ dryRun }),
  });
};
