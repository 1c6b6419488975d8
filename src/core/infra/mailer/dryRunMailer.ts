import { hashEmail, type MailerPort, type MailMessage, type Logger } from '@core/app';

/** Logs what would be sent instead of opening an SMTP connection. */
export class DryRunMailer implements MailerPort {
  constructor(private readonly logger: Logger) {}

  send(message: MailMessage): Promise<void> {
    this.logger.info('Dry run: would send mail.', {
      event: 'mailer.dry_run.would_send',
      outcome: 'skipped',
      emailHash: hashEmail(message.to.email),
      subject: message.subject,
      htmlLength: message.html?.length ?? 0,
      textLength: message.text?.length ?? 0,
    });

    return Promise.resolve();
  }
}
