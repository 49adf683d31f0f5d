import nodemailer, { type Transporter } from 'nodemailer';
import { createLogger } from '../../utils/logger.js';
import { DeliveryError, errorMessage } from '../../utils/errors.js';
import type { ThreadRecord } from '../monitoring/types.js';
import { renderDigest } from './renderer.js';
import type { DeliveryResult, DigestDelivery } from './scheduler.js';

const logger = createLogger('digest:mailer');

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
}

export function createSmtpTransport(settings: SmtpSettings): Transporter {
  return nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: settings.secure,
    ...(settings.user ? { auth: { user: settings.user, pass: settings.password } } : {}),
  });
}

export interface SmtpDeliveryOptions {
  transport: Transporter;
  from: string;
  to: string;
  now?: () => Date;
}

/** Emails the digest batch as one message with text and HTML parts. */
export class SmtpDelivery implements DigestDelivery {
  private readonly transport: Transporter;
  private readonly from: string;
  private readonly to: string;
  private readonly now: () => Date;

  constructor(options: SmtpDeliveryOptions) {
    this.transport = options.transport;
    this.from = options.from;
    this.to = options.to;
    this.now = options.now ?? (() => new Date());
  }

  async sendBatch(records: readonly ThreadRecord[]): Promise<DeliveryResult> {
    if (!this.to) {
      return { ok: false, error: new DeliveryError('No digest recipient configured') };
    }

    try {
      const digest = await renderDigest(records, this.now());
      const info: { messageId?: string } = await this.transport.sendMail({
        from: this.from,
        to: this.to,
        subject: digest.subject,
        text: digest.text,
        html: digest.html,
      });

      logger.debug('Digest email accepted', { messageId: info.messageId, count: records.length });
      return { ok: true, messageId: info.messageId };
    } catch (error) {
      return { ok: false, error: new DeliveryError(`SMTP send failed: ${errorMessage(error)}`, { cause: error }) };
    }
  }
}
