import nodemailer from 'nodemailer';
import { settings, MailSettings } from '../config/settings';
import { logger, errorMessage } from '../utils/logger';
import type { RenderedEmail } from '../utils/notificationEmails';

/**
 * Without an SMTP host the JSON transport is used: messages are built and
 * logged but never leave the process.
 */
export const createTransport = (mail: MailSettings): nodemailer.Transporter =>
  mail.host
    ? nodemailer.createTransport({
        host: mail.host,
        port: mail.port,
        secure: mail.secure,
        auth: mail.user ? { user: mail.user, pass: mail.pass } : undefined,
      })
    : nodemailer.createTransport({ jsonTransport: true });

export class EmailService {
  private transporter: nodemailer.Transporter;

  constructor(private readonly mail: MailSettings = settings.mail, transporter?: nodemailer.Transporter) {
    this.transporter = transporter ?? createTransport(mail);
  }

  /**
   * Send a rendered template. Delivery failures are logged and reported
   * through the return value; callers never fail because mail did.
   */
  async send(to: string | null | undefined, email: RenderedEmail): Promise<boolean> {
    if (!to) {
      logger.warn('No recipient email provided, skipping email.', { subject: email.subject });
      return false;
    }

    try {
      const info = await this.transporter.sendMail({
        from: this.mail.from,
        to,
        subject: email.subject,
        text: email.text,
        html: email.html,
      });
      logger.info('Email sent', { recipients: to, subject: email.subject, messageId: info.messageId });
      return true;
    } catch (error) {
      logger.error('Failed to send email', { recipients: to, subject: email.subject, error: errorMessage(error) });
      return false;
    }
  }
}

export const emailService = new EmailService();
