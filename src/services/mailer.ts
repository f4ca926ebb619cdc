import nodemailer, { type Transporter } from 'nodemailer';
import type Mail from 'nodemailer/lib/mailer';
import { DeliveryError, errorMessage } from '@/core/errors';
import type { Message } from '@/types/post';
import { withTimeout } from '@/utils/time';
import logger from '@/utils/logger';

export interface SmtpOptions {
  host: string;
  port: number;
  secure: boolean;
  timeoutMs: number;
}

export function createSmtpTransport(options: SmtpOptions): Transporter<unknown> {
  return nodemailer.createTransport({
    host: options.host,
    port: options.port,
    secure: options.secure,
    connectionTimeout: options.timeoutMs,
    greetingTimeout: options.timeoutMs,
    socketTimeout: options.timeoutMs
  });
}

export function toMailOptions(message: Message): Mail.Options {
  return {
    from: { name: message.from.name, address: message.from.address },
    to: message.to,
    subject: message.subject,
    text: message.text,
    date: message.date,
    messageId: message.messageId,
    inReplyTo: message.inReplyTo,
    references: message.inReplyTo,
    headers: message.headers,
    attachments: message.attachments.map(attachment => ({
      filename: attachment.filename,
      content: attachment.content,
      contentType: attachment.contentType
    }))
  };
}

/**
 * Sends composed messages through a nodemailer transport.
 */
export class Mailer {
  constructor(
    private readonly transport: Transporter<unknown>,
    private readonly timeoutMs: number
  ) {}

  /**
   * @throws DeliveryError when the relay rejects the message or does not answer in time
   */
  async deliver(message: Message): Promise<void> {
    try {
      await withTimeout(this.transport.sendMail(toMailOptions(message)), this.timeoutMs);
      logger.debug('Mail delivered', { messageId: message.messageId, attachments: message.attachments.length });
    } catch (error) {
      throw new DeliveryError(`Delivery of ${message.messageId} failed: ${errorMessage(error)}`, {
        messageId: message.messageId
      }, { cause: error });
    }
  }

  close(): void {
    this.transport.close();
  }
}
