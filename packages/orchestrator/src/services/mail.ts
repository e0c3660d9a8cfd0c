import { v4 as uuidv4 } from 'uuid';
import { moduleLogger } from '../logging/logger.js';

const log = moduleLogger('mail');

export interface OutboundMail {
  from: string;
  to: string;
  subject: string;
  body: string;
  thread_id: string;
  idempotency_key: string;
}

export interface MailTransport {
  send(mail: OutboundMail): Promise<{ message_id: string }>;
}

/**
 * Development transport: records the message in the log instead of sending it.
 */
export class LogMailTransport implements MailTransport {
  async send(mail: OutboundMail): Promise<{ message_id: string }> {
    const messageId = `<${uuidv4()}@outbox.local>`;
    log.info({
      msg: 'mail_sent',
      message_id: messageId,
      to: mail.to,
      subject: mail.subject,
      thread_id: mail.thread_id,
      idempotency_key: mail.idempotency_key,
      body_length: mail.body.length,
    });
    return { message_id: messageId };
  }
}

export function replySubject(subject: string): string {
  const trimmed = subject.trim();
  if (trimmed.length === 0) return 'Re: (no subject)';
  return /^re:/i.test(trimmed) ? trimmed : `Re: ${trimmed}`;
}
