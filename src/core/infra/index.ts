/**
 * Project: Mail Dispatch Worker
 * File: src/core/infra/index.ts
 * Summary: Barrel exports for infrastructure adapters.
 */

export * from './amqp/amqplibBroker';
export * from './mailer/dryRunMailer';
export * from './mailer/nodemailerMailer';
export * from './templates/fileTemplateStore';
export * from './logger/pinoLogger';
