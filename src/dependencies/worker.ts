/**
 * Filename: src/dependencies/worker.ts
 * Purpose: Wire the mail queue consumer with its broker connector, mailer, and template store.
 * License: MIT
 */

import {
  MailDispatchService,
  MailQueueConsumer,
  type BrokerConnector,
  type Logger,
  type MailerPort,
} from '@core/app';
import {
  DryRunMailer,
  FileTemplateStore,
  createAmqplibConnector,
  createNodemailerMailer,
} from '@core/infra';
import type { EnvironmentConfig } from '@/server/config/environment';

export type WorkerOverrides = {
  connect?: BrokerConnector;
  mailer?: MailerPort;
};

export type Worker = {
  consumer: MailQueueConsumer;
  dispatchService: MailDispatchService;
};

// Dry-run deployments never open an SMTP connection.
const createMailer = (config: EnvironmentConfig, logger: Logger): MailerPort => {
  const mailerLogger = logger.withContext({ component: 'mailer' });

  if (config.mail.dryRun) {
    mailerLogger.info('Mail dry run enabled; messages are logged, not sent.', {
      event: 'mailer.dry_run.enabled',
    });
    return new DryRunMailer(mailerLogger);
  }

  return createNodemailerMailer(
    {
      host: config.smtp.host,
      port: config.smtp.port,
      user: config.smtp.user,
      password: config.smtp.password,
    },
    mailerLogger,
  );
};

export const createWorker = (
  config: EnvironmentConfig,
  logger: Logger,
  overrides: WorkerOverrides = {},
): Worker => {
  const templateStore = new FileTemplateStore(logger.withContext({ component: 'templates' }), {
    overrideDirectory: config.templates.overrideDirectory,
  });
  const mailer = overrides.mailer ?? createMailer(config, logger);
  const dispatchService = new MailDispatchService(
    templateStore,
    mailer,
    logger.withContext({ component: 'dispatch' }),
    { branding: config.branding },
  );

  const consumer = new MailQueueConsumer(
    {
      connect: overrides.connect ?? createAmqplibConnector(logger),
      dispatcher: dispatchService,
      logger,
    },
    {
      connection: {
        host: config.broker.host,
        port: config.broker.port,
        username: config.broker.username,
        password: config.broker.password,
        heartbeatSeconds: config.broker.heartbeatSeconds,
      },
      queueName: config.broker.queueName,
      connectMaxAttempts: config.broker.connectMaxAttempts,
      connectRetryDelayMs: config.broker.connectRetryDelayMs,
      blockedConnectionTimeoutMs: config.broker.blockedConnectionTimeoutMs,
    },
  );

  return { consumer, dispatchService };
};
