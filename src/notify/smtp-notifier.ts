/**
 * SMTP notification gateway (nodemailer).
 */

import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type { Logger } from 'pino';
import type { SmtpConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { expiryFrom, renderMultiNotice, renderSingleNotice } from './templates.js';
import type { NoticeLink, NotificationGateway, RenderedNotice } from './types.js';

/** The part of a nodemailer transporter the notifier uses */
export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

/** Options for creating an SmtpNotifier */
export interface SmtpNotifierOptions {
  /** Custom transport (for testing) */
  transport?: MailTransport;
  /** Clock used for the expiry shown in the message */
  now?: () => Date;
}

export class SmtpNotifier implements NotificationGateway {
  private readonly config: SmtpConfig;
  private readonly logger: Logger;
  private readonly transport: MailTransport;
  private readonly now: () => Date;

  constructor(config: SmtpConfig, logger: Logger, options?: SmtpNotifierOptions) {
    this.config = config;
    this.logger = logger.child({ component: 'smtp-notifier' });
    this.now = options?.now ?? (() => new Date());
    this.transport =
      options?.transport ??
      nodemailer.createTransport({
        host: config.host,
        port: config.port,
        // Implicit TLS on 465, STARTTLS otherwise
        secure: config.port === 465,
        requireTLS: config.useTls,
        auth: config.username ? { user: config.username, pass: config.password } : undefined,
      });
  }

  async sendSingleNotice(
    recipient: string,
    sampleId: string,
    urls: NoticeLink[],
    ttlDays: number
  ): Promise<boolean> {
    const notice = renderSingleNotice(sampleId, urls, ttlDays, expiryFrom(this.now(), ttlDays));
    return this.deliver(recipient, notice, { sampleId });
  }

  async sendMultiNotice(
    recipient: string,
    sampleIds: string[],
    container: string,
    ttlDays: number
  ): Promise<boolean> {
    const notice = renderMultiNotice(sampleIds, container, ttlDays, expiryFrom(this.now(), ttlDays));
    return this.deliver(recipient, notice, { sampleCount: sampleIds.length, bucket: container });
  }

  private async deliver(
    recipient: string,
    notice: RenderedNotice,
    logContext: Record<string, unknown>
  ): Promise<boolean> {
    try {
      await this.transport.sendMail({
        from: this.config.fromAddress,
        to: recipient,
        subject: notice.subject,
        html: notice.html,
        text: notice.text,
      });
      this.logger.info({ recipient, ...logContext }, 'Notice sent');
      return true;
    } catch (err) {
      this.logger.error({ recipient, ...logContext, error: errorMessage(err) }, 'Failed to send notice');
      return false;
    }
  }
}
