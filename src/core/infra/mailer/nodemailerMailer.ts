import {
  MailTransportError,
  hashEmail,
  type Logger,
  type MailerPort,
  type MailMessage,
  type MailTransportFailureReason,
} from '@core/app';
/*
 * Nodemailer exposes `sendMail` with loose typings that rely on `any` under the
 * hood. We wrap the transporter in a Promise-based helper so the rest of the
 * module can stay fully typed.
 */
import { createTransport } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';

const DEFAULT_TIMEOUT_MS = 30_000;

const formatRecipient = (message: MailMessage) =>
  message.to.name ? `${message.to.name} <${message.to.email}>` : message.to.email;

export type SmtpRelayOptions = {
  host: string;
  port: number;
  user: string;
  password: string;
  timeoutMs?: number;
};

export type NodemailerMailerOptions = {
  from: string;
  host: string;
  port: number;
};

export type SafeTransporter = {
  sendMail: (options: SMTPTransport.Options) => Promise<SMTPTransport.SentMessageInfo>;
};

const createSafeTransporter = (relay: SmtpRelayOptions): SafeTransporter => {
  const timeoutMs = relay.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  // One connection per message: plain TCP upgraded with STARTTLS, then AUTH.
  const transporter = createTransport({
    host: relay.host,
    port: relay.port,
    secure: false,
    requireTLS: true,
    auth: { user: relay.user, pass: relay.password },
    connectionTimeout: timeoutMs,
    greetingTimeout: timeoutMs,
    socketTimeout: timeoutMs,
  });

  return {
    sendMail: (options) =>
      new Promise<SMTPTransport.SentMessageInfo>((resolve, reject) => {
        transporter.sendMail(options, (error: Error | null, info: SMTPTransport.SentMessageInfo) => {
          if (error) {
            reject(error);
            return;
          }

          resolve(info);
        });
      }),
  };
};

const NETWORK_ERROR_CODES: Record<string, Exclude<MailTransportFailureReason, 'delivery-failed'>> =
  {
    ENETUNREACH: 'network-unreachable',
    ECONNREFUSED: 'connection-refused',
  };

const readErrorCode = (value: unknown): string | undefined => {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }

  if ('code' in value && typeof value.code === 'string' && value.code in NETWORK_ERROR_CODES) {
    return value.code;
  }

  // Nodemailer sometimes reports ESOCKET and keeps the socket error as the cause.
  if ('cause' in value) {
    return readErrorCode(value.cause);
  }

  return undefined;
};

export const classifyTransportError = (error: unknown): MailTransportFailureReason => {
  const code = readErrorCode(error);
  return code ? NETWORK_ERROR_CODES[code] : 'delivery-failed';
};

export class NodemailerMailer implements MailerPort {
  constructor(
    private readonly transporter: SafeTransporter,
    private readonly options: NodemailerMailerOptions,
    private readonly logger: Logger,
  ) {}

  async send(message: MailMessage): Promise<void> {
    const emailHash = hashEmail(message.to.email);
    const target = `${this.options.host}:${this.options.port}`;

    this.logger.info(`Connecting to SMTP server at ${target}.`, {
      event: 'mailer.smtp.connect',
      emailHash,
    });

    try {
      await this.transporter.sendMail({
        from: this.options.from,
        to: formatRecipient(message),
        subject: message.subject,
        text: message.text,
        html: message.html,
      });
    } catch (error) {
      throw this.toTransportError(error, emailHash, target);
    }

    this.logger.info('Nodemailer message dispatched.', {
      event: 'mailer.smtp.send',
      outcome: 'success',
      emailHash,
      subject: message.subject,
    });
  }

  private toTransportError(error: unknown, emailHash: string, target: string): MailTransportError {
    const reason = classifyTransportError(error);

    if (reason === 'network-unreachable') {
      this.logger.error(
        `NETWORK ERROR: Cannot reach SMTP server ${target}. ` +
          'Check egress policies, firewall rules or DNS settings.',
        {
          event: 'mailer.smtp.network_unreachable',
          outcome: 'failure',
          severity: 'critical',
          emailHash,
          error,
        },
      );
      return new MailTransportError(`Network unreachable while sending via ${target}.`, reason, {
        cause: error,
      });
    }

    if (reason === 'connection-refused') {
      this.logger.error(
        `CONNECTION REFUSED: SMTP server ${target} refused the connection. ` +
          'Check that the server is running and the port is correct.',
        {
          event: 'mailer.smtp.connection_refused',
          outcome: 'failure',
          severity: 'critical',
          emailHash,
          error,
        },
      );
      return new MailTransportError(`Connection refused by ${target}.`, reason, { cause: error });
    }

    this.logger.error('Failed to send mail.', {
      event: 'mailer.smtp.send_failed',
      outcome: 'failure',
      host: this.options.host,
      port: this.options.port,
      user: this.options.from,
      emailHash,
      error,
    });
    return new MailTransportError(`Failed to send mail via ${target}.`, reason, { cause: error });
  }
}

export const createNodemailerMailer = (relay: SmtpRelayOptions, logger: Logger): NodemailerMailer => {
  const transporter = createSafeTransporter(relay);
  return new NodemailerMailer(
    transporter,
    { from: relay.user, host: relay.host, port: relay.port },
    logger,
  );
};
