/**
 * Mailbox Poller
 *
 * Runs the poll loop: search unseen mail, fetch and parse each match, drop
 * duplicates and filtered messages, update flags, then hand the accepted
 * batch to the print pipeline and wait for it before the next cycle.
 */

import { randomUUID } from 'crypto';
import { ServiceSettings } from '../config/serviceConfig';
import { MailboxClient } from '../connectors/types';
import { errorMessage } from '../errors';
import { MessageParser } from '../parsing/MessageParser';
import { EmailMessage } from '../parsing/types';
import logger from '../utils/logger';
import { runWithContext } from '../utils/requestContext';
import { MessageFilter } from './MessageFilter';
import { ProcessedIdSet } from './ProcessedIdSet';

export type BatchHandler = (batch: EmailMessage[]) => Promise<void>;
export type SkipHandler = (message: EmailMessage, reason: string) => void;

export interface MailboxPollerOptions {
  mailbox: MailboxClient;
  parser: MessageParser;
  email: ServiceSettings['email'];
  filters: ServiceSettings['filters'];
  onBatch: BatchHandler;
  onSkipped?: SkipHandler;
  processedIds?: ProcessedIdSet;
}

export class MailboxPoller {
  private readonly mailbox: MailboxClient;
  private readonly parser: MessageParser;
  private readonly email: ServiceSettings['email'];
  private readonly filters: ServiceSettings['filters'];
  private readonly filter: MessageFilter;
  private readonly onBatch: BatchHandler;
  private readonly onSkipped?: SkipHandler;
  readonly processedIds: ProcessedIdSet;

  private running = false;
  private wakeSleeper: (() => void) | null = null;

  constructor(options: MailboxPollerOptions) {
    this.mailbox = options.mailbox;
    this.parser = options.parser;
    this.email = options.email;
    this.filters = options.filters;
    this.filter = new MessageFilter(options.filters);
    this.onBatch = options.onBatch;
    this.onSkipped = options.onSkipped;
    this.processedIds = options.processedIds ?? new ProcessedIdSet();
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Poll until stop() is called. A cycle in progress always finishes.
   */
  async run(): Promise<void> {
    this.running = true;
    logger.info('Mail polling started', {
      folder: this.email.inbox_folder,
      checkInterval: this.email.check_interval,
    });

    while (this.running) {
      await this.runCycle();
      if (!this.running) break;
      await this.sleep(this.email.check_interval * 1000);
    }

    logger.info('Mail polling stopped');
  }

  /** Clear the running flag and cut the current sleep short. */
  stop(): void {
    this.running = false;
    this.wake();
  }

  wake(): void {
    const wakeSleeper = this.wakeSleeper;
    this.wakeSleeper = null;
    wakeSleeper?.();
  }

  /**
   * One poll cycle with its own log context. Failures never escape: the
   * mailbox connection is dropped and the next cycle reconnects.
   */
  async runCycle(): Promise<void> {
    const cycleId = randomUUID().slice(0, 8);

    await runWithContext({ cycleId }, async () => {
      try {
        const batch = await this.pollOnce();
        if (batch.length > 0) {
          logger.info(`Handing ${batch.length} message(s) to the printer`);
          await this.onBatch(batch);
        }
      } catch (error: unknown) {
        logger.error('Poll cycle failed', { error: errorMessage(error) });
        await this.dropConnection();
      }
    });
  }

  /**
   * Search, fetch, filter and flag. Returns the accepted batch.
   */
  async pollOnce(): Promise<EmailMessage[]> {
    if (!this.mailbox.isConnected) {
      await this.mailbox.connect();
    }

    await this.mailbox.selectFolder(this.email.inbox_folder);
    const ids = await this.mailbox.searchUnseen({
      allowedSenders: this.filters.allowed_senders,
      blockedSenders: this.filters.blocked_senders,
    });

    if (ids.length > 0) {
      logger.info(`Found ${ids.length} unseen message(s)`);
    }

    const batch: EmailMessage[] = [];
    for (const id of ids) {
      const message = await this.fetchMessage(id);
      if (!message) continue;

      if (this.processedIds.has(message.messageId)) {
        logger.debug('Skipping already processed message', { messageId: message.messageId });
        this.onSkipped?.(message, 'duplicate');
        continue;
      }

      const verdict = this.filter.evaluate(message);
      if (!verdict.accepted) {
        logger.info('Message filtered out', { subject: message.subject, reason: verdict.reason });
        this.onSkipped?.(message, verdict.reason);
        continue;
      }

      await this.updateFlags(id);
      this.processedIds.add(message.messageId);
      batch.push(message);
    }

    if (this.email.delete_after_print) {
      await this.expungeDeleted();
    }

    const evicted = this.processedIds.enforceLimit();
    if (evicted > 0) {
      logger.debug('Trimmed processed message cache', { evicted, size: this.processedIds.size });
    }

    return batch;
  }

  /** Forget every processed id (used on restart). */
  resetProcessed(): void {
    this.processedIds.clear();
  }

  async disconnect(): Promise<void> {
    await this.mailbox.disconnect();
  }

  private async fetchMessage(id: number): Promise<EmailMessage | null> {
    try {
      const raw = await this.mailbox.fetch(id);
      return await this.parser.parse(raw);
    } catch (error: unknown) {
      logger.error('Failed to fetch message', { uid: id, error: errorMessage(error) });
      return null;
    }
  }

  private async updateFlags(id: number): Promise<void> {
    if (this.email.mark_as_read) {
      try {
        await this.mailbox.setFlag(id, 'seen');
      } catch (error: unknown) {
        logger.warn('Failed to mark message as read', { uid: id, error: errorMessage(error) });
      }
    }

    if (this.email.delete_after_print) {
      try {
        await this.mailbox.setFlag(id, 'deleted');
      } catch (error: unknown) {
        logger.warn('Failed to flag message for deletion', { uid: id, error: errorMessage(error) });
      }
    }
  }

  private async expungeDeleted(): Promise<void> {
    try {
      await this.mailbox.expunge();
    } catch (error: unknown) {
      logger.warn('Failed to expunge deleted messages', { error: errorMessage(error) });
    }
  }

  private async dropConnection(): Promise<void> {
    try {
      await this.mailbox.disconnect();
    } catch (error: unknown) {
      logger.warn('Mailbox disconnect failed', { error: errorMessage(error) });
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wakeSleeper = null;
        resolve();
      }, ms);
      this.wakeSleeper = () => {
        clearTimeout(timer);
        resolve();
      };
    });
  }
}
