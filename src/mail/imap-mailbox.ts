import { Logger } from '@nestjs/common';
import { ImapFlow } from 'imapflow';
import type { MailAccountConfig } from '../config/config.types';
import { ConnectionError, ProbeError, toProbeError } from '../shared/errors';
import { getErrorMessage } from '../shared/error.utils';
import type { Mailbox, MailboxMatch, MailboxQuery } from '../probe/interfaces/mail-capabilities.interface';

const INBOX = 'INBOX';

/**
 * {@link Mailbox} backed by imapflow. Every call opens its own session on INBOX and logs out.
 */
export class ImapMailbox implements Mailbox {
  private readonly logger = new Logger(ImapMailbox.name);

  constructor(
    private readonly account: MailAccountConfig,
    private readonly timeoutMs: number,
  ) {}

  /**
   * Searches by sender and subject, then re-checks each envelope subject since IMAP
   * SUBJECT matching is server-defined.
   */
  async findMessages(query: MailboxQuery): Promise<MailboxMatch[]> {
    return this.withInbox(async (client) => {
      const uids = await client.search({ from: query.from, subject: query.subjectContains }, { uid: true });
      // imapflow resolves a failed SEARCH to false instead of rejecting
      if (!Array.isArray(uids)) {
        throw client.usable
          ? new ProbeError('unexpected', `IMAP search in ${INBOX} on ${this.account.imap.host} failed`)
          : new ConnectionError(`IMAP connection to ${this.account.imap.host} lost during search`);
      }
      if (uids.length === 0) {
        return [];
      }

      const matches: MailboxMatch[] = [];
      for await (const message of client.fetch(uids, { envelope: true }, { uid: true })) {
        const subject = message.envelope?.subject ?? '';
        if (subject.includes(query.subjectContains)) {
          matches.push({ uid: message.uid, subject });
        }
      }
      return matches;
    });
  }

  async deleteMessages(matches: MailboxMatch[]): Promise<void> {
    if (matches.length === 0) {
      return;
    }

    await this.withInbox(async (client) => {
      await client.messageDelete(
        matches.map((match) => match.uid),
        { uid: true },
      );
    });
  }

  private createClient(): ImapFlow {
    return new ImapFlow({
      host: this.account.imap.host,
      port: this.account.imap.port,
      secure: this.account.imap.useSsl,
      auth: {
        user: this.account.address,
        pass: this.account.password,
      },
      logger: false,
      connectionTimeout: this.timeoutMs,
      greetingTimeout: this.timeoutMs,
      socketTimeout: this.timeoutMs,
    });
  }

  /**
   * Runs `work` on a locked INBOX. Socket failures that imapflow reports as `'error'` events
   * reject the call instead of escaping as uncaught exceptions.
   */
  private async withInbox<T>(work: (client: ImapFlow) => Promise<T>): Promise<T> {
    const client = this.createClient();
    let rejectSession: (error: unknown) => void = () => undefined;
    const connectionLost = new Promise<never>((_resolve, reject) => {
      rejectSession = reject;
    });
    client.on('error', (error: unknown) => {
      this.logger.warn(`IMAP connection to ${this.account.imap.host} failed: ${getErrorMessage(error)}`);
      rejectSession(error);
    });

    try {
      return await Promise.race([this.runLocked(client, work), connectionLost]);
    } catch (error) {
      throw toProbeError(error);
    } finally {
      await this.logout(client);
    }
  }

  private async runLocked<T>(client: ImapFlow, work: (client: ImapFlow) => Promise<T>): Promise<T> {
    await client.connect();
    const lock = await client.getMailboxLock(INBOX);
    try {
      return await work(client);
    } finally {
      lock.release();
    }
  }

  private async logout(client: ImapFlow): Promise<void> {
    if (!client.usable) {
      return;
    }
    try {
      await client.logout();
    } catch (error) {
      this.logger.debug(`IMAP logout from ${this.account.imap.host} failed: ${getErrorMessage(error)}`);
    }
  }
}
