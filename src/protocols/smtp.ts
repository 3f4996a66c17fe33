import type { SessionContext } from '../core/context.js';
import { ConfigurationError, LocalFileError } from '../core/errors.js';
import { MailPayloadSink } from '../core/response.js';
import { extractAddress, type PreparedSmtpRequest, type SmtpEngine } from '../transport/smtp.js';
import { composeMail } from '../utils/mime.js';

export interface MailMessage {
  /** Sender, `user@host` or `Name <user@host>` */
  from: string;
  to: string;
  subject: string;
  message: string;
  /** Local files sent as base64 attachments */
  attachments?: string[];
  /** Login name; defaults to the sender's address */
  username?: string;
  password?: string;
  timeout?: number;
}

/**
 * Mail submission over `smtp://` (STARTTLS per the session's `smtpTls`
 * policy) or `smtps://`. Operations resolve to `true` once the server
 * accepted the message; the reason for a `false` is logged at warn level.
 *
 * @example
 * ```typescript
 * const sent = await session.smtp.sendMail('smtps://mail.example.com', {
 *   from: 'me@example.com',
 *   password: 'test-secret',
 *   to: 'you@example.com',
 *   subject: 'Hello',
 *   message: 'Hi there',
 * });
 * ```
 */
export class SmtpClient {
  constructor(
    private readonly context: SessionContext,
    private readonly engine: SmtpEngine
  ) {}

  sendMail(server: string, mail: MailMessage): Promise<boolean> {
    return this.sendEmail(server, mail, false);
  }

  sendMailHtml(server: string, mail: MailMessage): Promise<boolean> {
    return this.sendEmail(server, mail, true);
  }

  /**
   * Without attachments the message goes out flat; with them as
   * `multipart/mixed`. Attachments are read before connecting.
   */
  async sendEmail(server: string, mail: MailMessage, isHtml: boolean): Promise<boolean> {
    this.context.assertOpen();
    const { logger } = this.context;

    let prepared: PreparedSmtpRequest;
    try {
      prepared = this.engine.prepare({
        url: server,
        from: mail.from,
        recipients: [mail.to],
        subject: mail.subject,
        username: mail.username ?? extractAddress(mail.from),
        password: mail.password,
        tls: this.context.config.smtpTls,
        timeout: mail.timeout,
      });
    } catch (error) {
      if (error instanceof ConfigurationError) {
        logger.warn(`[SMTP] ${server}: ${error.message}`);
        return false;
      }
      throw error;
    }

    let payload: Buffer;
    try {
      payload = await composeMail(
        { from: mail.from, to: mail.to, subject: mail.subject },
        mail.message,
        isHtml,
        mail.attachments ?? []
      );
    } catch (error) {
      if (error instanceof LocalFileError) {
        logger.warn(`[SMTP] ${error.message}`);
        return false;
      }
      throw error;
    }

    const sink = new MailPayloadSink(payload);
    const result = await this.engine.perform(prepared, sink);
    if (!result.ok) {
      logger.warn(`[SMTP] Sending to ${mail.to} via ${server} failed: ${result.error ?? 'unknown error'}`);
      return false;
    }

    logger.debug(`[SMTP] Delivered ${sink.bytesRead} of ${sink.length} bytes to ${mail.to}`);
    return true;
  }
}
