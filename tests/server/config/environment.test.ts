/**
 * Filename: tests/server/config/environment.test.ts
 * Purpose: Ensure environment configuration parsing and validation behave as expected.
 * License: MIT
 */

import assert from 'node:assert/strict';
import test from 'node:test';

import {
  EnvironmentValidationError,
  parseEnvironment,
} from '../../../src/server/config/environment';

const baseEnv = (): Record<string, string | undefined> => ({
  RABBITMQ_MAIL_QUEUE_NAME: 'mail',
  RABBITMQ_USERNAME: 'guest',
  RABBITMQ_PASSWORD: 'test-secret',
  SMTP_USER: 'mailer@example.com',
  SMTP_PASSWORD: 'test-secret',
  APP_NAME: 'Acme',
  APP_OWNER: 'Acme Ltd',
  CONTACT_EMAIL: 'help@example.com',
});

const captureIssues = (env: Record<string, string | undefined>) => {
  try {
    parseEnvironment(env);
  } catch (error) {
    if (error instanceof EnvironmentValidationError) {
      return error;
    }
    throw error;
  }

  assert.fail('Expected parseEnvironment to throw.');
};

test('parseEnvironment applies defaults for optional settings', () => {
  const config = parseEnvironment(baseEnv());

  assert.deepEqual(config.broker, {
    host: 'localhost',
    port: 5672,
    queueName: 'mail',
    username: 'guest',
    password: 'test-secret',
    heartbeatSeconds: 0,
    connectMaxAttempts: 10,
    connectRetryDelayMs: 5_000,
    blockedConnectionTimeoutMs: 300_000,
  });
  assert.deepEqual(config.smtp, {
    host: 'localhost',
    port: 587,
    user: 'mailer@example.com',
    password: 'test-secret',
  });
  assert.equal(config.branding.appName, 'Acme');
  assert.equal(config.branding.primaryColor, '#2563eb');
  assert.equal(config.templates.overrideDirectory, null);
  assert.equal(config.mail.dryRun, false);
  assert.equal(Object.isFrozen(config), true);
  assert.equal(Object.isFrozen(config.broker), true);
});

test('parseEnvironment reads explicit values', () => {
  const config = parseEnvironment({
    ...baseEnv(),
    RABBITMQ_HOST: ' rabbit.internal ',
    RABBITMQ_PORT: '5673',
    RABBITMQ_HEARTBEAT: '30',
    RABBITMQ_CONNECT_MAX_ATTEMPTS: '3',
    RABBITMQ_CONNECT_RETRY_DELAY_MS: '250',
    RABBITMQ_BLOCKED_TIMEOUT_SECONDS: '10',
    SMTP_SERVER: 'smtp.example.com',
    SMTP_PORT: '2525',
    PRIMARY_COLOR: '#111111',
    LOGO_URL: 'https://example.com/logo.png',
    EMAIL_TEMPLATES_DIR: '/etc/mail-templates',
    MAIL_DRY_RUN: 'true',
  });

  assert.equal(config.broker.host, 'rabbit.internal');
  assert.equal(config.broker.port, 5673);
  assert.equal(config.broker.heartbeatSeconds, 30);
  assert.equal(config.broker.connectMaxAttempts, 3);
  assert.equal(config.broker.connectRetryDelayMs, 250);
  assert.equal(config.broker.blockedConnectionTimeoutMs, 10_000);
  assert.equal(config.smtp.host, 'smtp.example.com');
  assert.equal(config.smtp.port, 2525);
  assert.equal(config.branding.primaryColor, '#111111');
  assert.equal(config.branding.logoUrl, 'https://example.com/logo.png');
  assert.equal(config.templates.overrideDirectory, '/etc/mail-templates');
  assert.equal(config.mail.dryRun, true);
});

test('parseEnvironment lists every missing required key', () => {
  const error = captureIssues({});

  assert.deepEqual(
    error.issues.map((issue) => issue.key),
    [
      'RABBITMQ_MAIL_QUEUE_NAME',
      'RABBITMQ_USERNAME',
      'RABBITMQ_PASSWORD',
      'SMTP_USER',
      'SMTP_PASSWORD',
      'CONTACT_EMAIL',
      'APP_NAME',
      'APP_OWNER',
    ],
  );
  assert.equal(error.issues[0]?.message, 'RABBITMQ_MAIL_QUEUE_NAME is required.');
  assert.equal(
    error.message,
    'Environment configuration is invalid: RABBITMQ_MAIL_QUEUE_NAME, RABBITMQ_USERNAME, ' +
      'RABBITMQ_PASSWORD, SMTP_USER, SMTP_PASSWORD, CONTACT_EMAIL, APP_NAME, APP_OWNER.',
  );
});

test('blank required values count as missing', () => {
  const error = captureIssues({ ...baseEnv(), APP_NAME: '   ' });

  assert.deepEqual(error.issues, [{ key: 'APP_NAME', message: 'APP_NAME is required.' }]);
});

test('parseEnvironment rejects malformed numbers', () => {
  const error = captureIssues({
    ...baseEnv(),
    RABBITMQ_PORT: '70000',
    SMTP_PORT: 'abc',
    RABBITMQ_CONNECT_MAX_ATTEMPTS: '0',
  });

  assert.deepEqual(error.issues, [
    { key: 'RABBITMQ_PORT', message: 'RABBITMQ_PORT must be an integer in the range 1-65535.' },
    {
      key: 'RABBITMQ_CONNECT_MAX_ATTEMPTS',
      message: 'RABBITMQ_CONNECT_MAX_ATTEMPTS must be an integer in the range >= 1.',
    },
    { key: 'SMTP_PORT', message: 'SMTP_PORT must be an integer in the range 1-65535.' },
  ]);
});

test('parseEnvironment rejects unknown boolean flags and bad contact addresses', () => {
  const error = captureIssues({
    ...baseEnv(),
    MAIL_DRY_RUN: 'maybe',
    CONTACT_EMAIL: 'not-an-email',
  });

  assert.deepEqual(error.issues, [
    { key: 'CONTACT_EMAIL', message: 'CONTACT_EMAIL must be an email address.' },
    { key: 'MAIL_DRY_RUN', message: 'MAIL_DRY_RUN must be set to "true" or "false".' },
  ]);
});
