import type { MailAccountConfig } from '../../config/config.types';

/**
 * A probe message ready to hand to an SMTP server.
 */
export interface ProbeMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
  headers?: Record<string, string>;
}

/**
 * Criteria used to find a probe message in a mailbox.
 */
export interface MailboxQuery {
  from: string;
  /** Substring the subject must contain (the correlation token) */
  subjectContains: string;
}

/**
 * A message found by {@link Mailbox.findMessages}.
 */
export interface MailboxMatch {
  uid: number;
  subject: string;
}

/**
 * "Can deliver a message to an address."
 */
export interface MailSender {
  send(message: ProbeMessage): Promise<void>;
}

/**
 * "Can search a mailbox for a message and delete it."
 */
export interface Mailbox {
  findMessages(query: MailboxQuery): Promise<MailboxMatch[]>;
  deleteMessages(matches: MailboxMatch[]): Promise<void>;
}

/**
 * Builds the send and receive capabilities for an account.
 * Swapped for in-memory fakes in tests.
 */
export interface MailClientFactory {
  createSender(account: MailAccountConfig): MailSender;
  createMailbox(account: MailAccountConfig): Mailbox;
}

export const MAIL_CLIENT_FACTORY = Symbol('MAIL_CLIENT_FACTORY');
