/**
 * Filename: tests/core/mailer/nodemailerMailer.test.ts
 * Purpose: Check SMTP message mapping and transport failure classification in the nodemailer
 * adapter.
 * License: MIT
 */

import assert from 'node:assert/strict';
import test from 'node:test';

import type SMTPTransport from 'nodemailer/lib/smtp-transport';

import { MailTransportError } from '../../../src/core/app';
import {
  NodemailerMailer,
  classifyTransportError,
  createNodemailerMailer,
  type SafeTransporter,
} from '../../../src/core/infra/mailer/nodemailerMailer';
import { InMemoryLogger } from '../__fixtures__/inMemoryMailAdapters';

class SocketError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SocketError';
  }
}

const sentInfo: SMTPTransport.SentMessageInfo = {
  envelope: { from: 'noreply@example.com', to: ['sam@example.com'] },
  messageId: '<test-message@example.com>',
  accepted: ['sam@example.com'],
  rejected: [],
  pending: [],
  response: '250 OK',
};

const createTransporter = (failure?: Error) => {
  const calls: SMTPTransport.Options[] = [];
  const transporter: SafeTransporter = {
    sendMail: async (options) => {
      calls.push(options);
      if (failure) {
        throw failure;
      }
      return sentInfo;
    },
  };

  return { transporter, calls };
};

const createMailer = (failure?: Error) => {
  const { transporter, calls } = createTransporter(failure);
  const logger = new InMemoryLogger();
  const mailer = new NodemailerMailer(
    transporter,
    { from: 'noreply@example.com', host: 'smtp.example.com', port: 587 },
    logger,
  );

  return { mailer, calls, logger };
};

test('send maps the message onto nodemailer options', async () => {
  const { mailer, calls, logger } = createMailer();

  await mailer.send({
    to: { email: 'sam@example.com' },
    subject: 'Your code',
    html: '<p>123456</p>',
  });

  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.from, 'noreply@example.com');
  assert.equal(calls[0]?.to, 'sam@example.com');
  assert.equal(calls[0]?.subject, 'Your code');
  assert.equal(calls[0]?.html, '<p>123456</p>');
  assert.equal(calls[0]?.text, undefined);
  assert.equal(logger.find('mailer.smtp.send')?.context.outcome, 'success');
});

test('send includes the display name when the recipient has one', async () => {
  const { mailer, calls } = createMailer();

  await mailer.send({
    to: { email: 'sam@example.com', name: 'Sam' },
    subject: 'Hi',
    text: 'Hello',
  });

  assert.equal(calls[0]?.to, 'Sam <sam@example.com>');
  assert.equal(calls[0]?.text, 'Hello');
});

test('refused connections become critical connection-refused failures', async () => {
  const refused = new SocketError('connect ECONNREFUSED 10.0.0.1:587', 'ECONNREFUSED');
  const { mailer, logger } = createMailer(refused);

  await assert.rejects(
    mailer.send({ to: { email: 'sam@example.com' }, subject: 'Hi', text: 'Hello' }),
    (error: unknown) => {
      assert.ok(error instanceof MailTransportError);
      assert.equal(error.reason, 'connection-refused');
      assert.equal(error.message, 'Connection refused by smtp.example.com:587.');
      assert.equal(error.cause, refused);
      return true;
    },
  );

  const entry = logger.find('mailer.smtp.connection_refused');
  assert.equal(entry?.level, 'error');
  assert.equal(entry?.context.severity, 'critical');
});

test('network errors wrapped by nodemailer are found through the cause chain', async () => {
  const unreachable = new SocketError('connect ENETUNREACH', 'ENETUNREACH');
  const { mailer, logger } = createMailer(
    new SocketError('Connection error', 'ESOCKET', { cause: unreachable }),
  );

  await assert.rejects(
    mailer.send({ to: { email: 'sam@example.com' }, subject: 'Hi', text: 'Hello' }),
    (error: unknown) =>
      error instanceof MailTransportError && error.reason === 'network-unreachable',
  );

  assert.equal(logger.find('mailer.smtp.network_unreachable')?.context.severity, 'critical');
});

test('other failures are reported as delivery failures', async () => {
  const { mailer, logger } = createMailer(new Error('535 Authentication failed'));

  await assert.rejects(
    mailer.send({ to: { email: 'sam@example.com' }, subject: 'Hi', text: 'Hello' }),
    (error: unknown) =>
      error instanceof MailTransportError && error.reason === 'delivery-failed',
  );

  assert.equal(logger.find('mailer.smtp.send_failed')?.context.host, 'smtp.example.com');
  assert.equal(logger.find('mailer.smtp.send')?.level, undefined);
});

test('classifyTransportError reads codes from the error or its causes', () => {
  assert.equal(
    classifyTransportError(new SocketError('x', 'ECONNREFUSED')),
    'connection-refused',
  );
  assert.equal(classifyTransportError(new SocketError('x', 'ETIMEDOUT')), 'delivery-failed');
  assert.equal(classifyTransportError('boom'), 'delivery-failed');
  assert.equal(classifyTransportError(null), 'delivery-failed');
});

test('createNodemailerMailer builds a mailer without connecting', () => {
  const mailer = createNodemailerMailer(
    { host: 'smtp.example.com', port: 587, user: 'mailer@example.com', password: 'test-secret' },
    new InMemoryLogger(),
  );

  assert.ok(mailer instanceof NodemailerMailer);
});
