import { FetchMessageObject, ImapFlow, SearchObject } from 'imapflow';
import { MailboxError } from '../errors';
import logger from '../utils/logger';
import { MailboxClient, MailboxConnectionConfig, MailboxFlag, UnseenSearchCriteria } from './types';

const FLAG_NAMES: Record<MailboxFlag, string> = {
  seen: '\\Seen',
  deleted: '\\Deleted',
};

/**
 * Build the IMAP search for unseen mail: allowed senders are OR'd,
 * blocked senders are each excluded.
 */
export function buildUnseenQuery(criteria: UnseenSearchCriteria): SearchObject {
  const query: SearchObject = { seen: false };

  const allowed = criteria.allowedSenders.filter(Boolean);
  if (allowed.length === 1) {
    query.from = allowed[0];
  } else if (allowed.length > 1) {
    query.or = allowed.map((sender) => ({ from: sender }));
  }

  const blocked = criteria.blockedSenders.filter(Boolean);
  if (blocked.length === 1) {
    query.not = { from: blocked[0] };
  } else if (blocked.length > 1) {
    query.not = { or: blocked.map((sender) => ({ from: sender })) };
  }

  return query;
}

/**
 * IMAP mailbox access over imapflow. Ids are UIDs of the selected folder.
 */
export class ImapMailboxClient implements MailboxClient {
  private client: ImapFlow | null = null;
  private pendingDeletes = new Set<number>();

  constructor(private readonly config: MailboxConnectionConfig) {}

  get isConnected(): boolean {
    return this.client !== null;
  }

  private requireClient(): ImapFlow {
    if (!this.client) {
      throw new MailboxError('Mailbox is not connected', 'connect');
    }
    return this.client;
  }

  async connect(): Promise<void> {
    if (this.client) return;

    const client = new ImapFlow({
      host: this.config.host,
      port: this.config.port,
      secure: this.config.secure,
      auth: {
        user: this.config.username,
        pass: this.config.password,
      },
      logger: false,
    });

    client.on('error', (error: Error) => {
      logger.warn('IMAP connection error', { error: error.message });
    });
    client.on('close', () => {
      if (this.client === client) {
        this.client = null;
      }
    });

    try {
      await client.connect();
    } catch (error: unknown) {
      throw MailboxError.fromCause('connect', error, this.config.host);
    }

    this.client = client;
    logger.info('Connected to mailbox', { host: this.config.host, user: this.config.username });
  }

  async selectFolder(folder: string): Promise<void> {
    const client = this.requireClient();
    try {
      await client.mailboxOpen(folder);
    } catch (error: unknown) {
      throw MailboxError.fromCause('search', error, `select ${folder}`);
    }
    this.pendingDeletes.clear();
  }

  async searchUnseen(criteria: UnseenSearchCriteria): Promise<number[]> {
    const client = this.requireClient();
    try {
      const uids = await client.search(buildUnseenQuery(criteria), { uid: true });
      return uids || [];
    } catch (error: unknown) {
      throw MailboxError.fromCause('search', error);
    }
  }

  async fetch(id: number): Promise<Buffer> {
    const client = this.requireClient();
    let message: FetchMessageObject | false;
    try {
      message = await client.fetchOne(String(id), { source: true }, { uid: true });
    } catch (error: unknown) {
      throw MailboxError.fromCause('fetch', error, `uid ${id}`);
    }
    if (!message || !message.source) {
      throw new MailboxError(`Message ${id} has no content`, 'fetch');
    }
    return message.source;
  }

  async setFlag(id: number, flag: MailboxFlag): Promise<void> {
    const client = this.requireClient();
    try {
      await client.messageFlagsAdd(String(id), [FLAG_NAMES[flag]], { uid: true });
    } catch (error: unknown) {
      throw MailboxError.fromCause('flag', error, `uid ${id} ${flag}`);
    }
    if (flag === 'deleted') {
      this.pendingDeletes.add(id);
    }
  }

  async expunge(): Promise<void> {
    if (this.pendingDeletes.size === 0) return;
    const client = this.requireClient();
    const uids = [...this.pendingDeletes];
    try {
      await client.messageDelete(uids.join(','), { uid: true });
    } catch (error: unknown) {
      throw MailboxError.fromCause('expunge', error);
    }
    this.pendingDeletes.clear();
    logger.debug('Expunged deleted messages', { count: uids.length });
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    this.pendingDeletes.clear();
    try {
      await client.logout();
    } catch (error: unknown) {
      logger.warn('Mailbox logout failed, closing connection', {
        error: error instanceof Error ? error.message : String(error),
      });
      client.close();
    }
  }
}
