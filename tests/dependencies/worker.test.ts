/**
 * Filename: tests/dependencies/worker.test.ts
 * Purpose: Run the fully wired worker in dry-run mode against the bundled templates and an
 * in-process broker.
 * License: MIT
 */

import assert from 'node:assert/strict';
import test from 'node:test';

import { createWorker } from '../../src/dependencies/worker';
import { parseEnvironment } from '../../src/server/config/environment';
import { InMemoryBroker, waitFor } from '../core/__fixtures__/inMemoryBroker';
import { InMemoryLogger } from '../core/__fixtures__/inMemoryMailAdapters';

const config = parseEnvironment({
  RABBITMQ_MAIL_QUEUE_NAME: 'mail',
  RABBITMQ_USERNAME: 'guest',
  RABBITMQ_PASSWORD: 'test-secret',
  SMTP_USER: 'mailer@example.com',
  SMTP_PASSWORD: 'test-secret',
  APP_NAME: 'Acme',
  APP_OWNER: 'Acme Ltd',
  CONTACT_EMAIL: 'help@example.com',
  MAIL_DRY_RUN: 'true',
});

test('a dry-run worker renders bundled templates and acknowledges the request', async () => {
  const broker = new InMemoryBroker();
  const logger = new InMemoryLogger();
  const { consumer } = createWorker(config, logger, { connect: broker.connect });

  await consumer.connect();
  const running = consumer.start();
  broker.publish('mail', {
    template_name: 'email_verification',
    username: 'sam',
    recipient: 'sam@example.com',
    verification_code: '123456',
  });

  await waitFor(() => broker.acknowledged.length === 1);
  await consumer.stop();
  await running;

  const entry = logger.find('mailer.dry_run.would_send');
  assert.equal(entry?.context.component, 'mailer');
  assert.equal(entry?.context.subject, 'Your Acme verification code: 123456');
  assert.equal(typeof entry?.context.htmlLength, 'number');
  assert.equal(broker.readyCount('mail_dlq'), 0);
});

test('an unknown template is dead-lettered by the wired worker', async () => {
  const broker = new InMemoryBroker();
  const logger = new InMemoryLogger();
  const { consumer } = createWorker(config, logger, { connect: broker.connect });

  await consumer.connect();
  const running = consumer.start();
  broker.publish('mail', {
    template_name: 'does_not_exist',
    username: 'sam',
    recipient: 'sam@example.com',
  });

  await waitFor(() => broker.readyCount('mail_dlq') === 1);
  await consumer.stop();
  await running;

  assert.equal(logger.find('mail.template.not_found')?.context.component, 'dispatch');
});
