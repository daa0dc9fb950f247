/**
 * Mail Print Service
 *
 * Wires the mailbox poller to the print pipeline and owns the service
 * lifecycle. The control API talks to it through the ServiceControl
 * interface.
 */

import { ServiceConfig, ServiceSettings } from '../config/serviceConfig';
import { ImapMailboxClient } from '../connectors/ImapMailboxClient';
import { MailboxClient, SpoolerJob } from '../connectors/types';
import { MailboxError, PrintError, ValidationError, errorMessage } from '../errors';
import { MailboxPoller } from '../ingestion/MailboxPoller';
import { MessageParser } from '../parsing/MessageParser';
import { PrinterManager, Sleep } from '../printing/PrinterManager';
import { JobStatus, PrintJob, PrinterStatus } from '../printing/types';
import { HtmlRenderer, WkhtmltopdfRenderer } from '../rendering/HtmlRenderer';
import logger from '../utils/logger';
import { PrintOrchestrator } from './PrintOrchestrator';
import { ServiceStats, StatsReport } from './serviceStats';

export interface ServiceStatus {
  running: boolean;
  stats: StatsReport;
  config: {
    emailServer: string;
    printer: string;
    checkInterval: number;
  };
}

export interface JobListing {
  active: SpoolerJob[];
  history: PrintJob[];
}

/**
 * Operations exposed to the control API.
 */
export interface ServiceControl {
  getStatus(): ServiceStatus;
  getStats(): StatsReport;
  getPrinterStatus(): Promise<PrinterStatus>;
  listJobs(): Promise<JobListing>;
  getJobStatus(jobId: number): Promise<JobStatus>;
  cancelJob(jobId: number): Promise<void>;
  stop(): Promise<void>;
  restart(): Promise<void>;
}

export interface MailPrintServiceDependencies {
  mailbox?: MailboxClient;
  printerManager?: PrinterManager;
  htmlRenderer?: HtmlRenderer;
  /** Used for the fixed attachment wait */
  sleep?: Sleep;
}

export function createMailboxClient(email: ServiceSettings['email']): MailboxClient {
  return new ImapMailboxClient({
    host: email.server,
    port: email.port,
    secure: email.use_ssl,
    username: email.username,
    password: email.password,
  });
}

export class MailPrintService implements ServiceControl {
  readonly stats = new ServiceStats();
  private readonly settings: ServiceSettings;
  private readonly mailbox: MailboxClient;
  private readonly printerManager: PrinterManager;
  private readonly orchestrator: PrintOrchestrator;
  private readonly poller: MailboxPoller;

  private running = false;
  private loopPromise: Promise<void> | null = null;
  private stopped: Promise<void> = Promise.resolve();
  private signalStopped: () => void = () => undefined;

  constructor(config: ServiceConfig, dependencies: MailPrintServiceDependencies = {}) {
    this.settings = config.values;
    const { email, printer, filters, processing } = this.settings;

    this.mailbox = dependencies.mailbox ?? createMailboxClient(email);
    this.printerManager =
      dependencies.printerManager ?? new PrinterManager({ printer, processing });
    this.orchestrator = new PrintOrchestrator({
      printerManager: this.printerManager,
      htmlRenderer: dependencies.htmlRenderer ?? new WkhtmltopdfRenderer(),
      processing,
      printer,
      stats: this.stats,
      sleep: dependencies.sleep,
    });
    this.poller = new MailboxPoller({
      mailbox: this.mailbox,
      parser: new MessageParser({ maxAttachmentSize: filters.max_attachment_size }),
      email,
      filters,
      onBatch: (batch) => this.orchestrator.processBatch(batch),
      onSkipped: () => this.stats.recordSkipped(),
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Connect, select the inbox folder and disconnect again.
   */
  async testMailboxConnection(): Promise<boolean> {
    try {
      await this.mailbox.connect();
      await this.mailbox.selectFolder(this.settings.email.inbox_folder);
      logger.info('Mailbox connection test passed', { server: this.settings.email.server });
      return true;
    } catch (error: unknown) {
      logger.error('Mailbox connection test failed', { error: errorMessage(error) });
      return false;
    } finally {
      await this.disconnectMailbox();
    }
  }

  async testPrinterConnection(): Promise<boolean> {
    await this.printerManager.initialize();
    return this.printerManager.testConnection();
  }

  /**
   * Check both external systems and mark the service running.
   */
  async start(): Promise<void> {
    if (this.running) return;
    logger.info('Starting mail print service');

    if (!(await this.testMailboxConnection())) {
      throw new MailboxError('Mailbox connection test failed', 'connect');
    }
    if (!(await this.testPrinterConnection())) {
      throw PrintError.noPrinter();
    }

    this.running = true;
    this.stats.markStarted();
    this.stopped = new Promise((resolve) => {
      this.signalStopped = resolve;
    });
    logger.info('All connection tests passed');
  }

  /**
   * Start and keep polling until stop() completes.
   */
  async run(): Promise<void> {
    await this.start();
    this.loopPromise = this.poller.run();
    await this.stopped;
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    logger.info('Stopping mail print service');
    this.running = false;

    this.poller.stop();
    await this.loopPromise;
    this.loopPromise = null;

    await this.disconnectMailbox();
    this.logStatistics();
    this.signalStopped();
  }

  /**
   * Restart the poll loop in place with an empty duplicate cache.
   */
  async restart(): Promise<void> {
    if (!this.running) {
      throw new ValidationError('Service is not running');
    }
    logger.info('Restarting mail polling');

    this.poller.stop();
    await this.loopPromise;
    // stop() may have completed while the loop was winding down
    if (!this.running) return;
    this.poller.resetProcessed();
    this.loopPromise = this.poller.run();
  }

  getStatus(): ServiceStatus {
    return {
      running: this.running,
      stats: this.getStats(),
      config: {
        emailServer: this.settings.email.server,
        printer: this.printerManager.activePrinter ?? this.settings.printer.name,
        checkInterval: this.settings.email.check_interval,
      },
    };
  }

  getStats(): StatsReport {
    return this.stats.report();
  }

  getPrinterStatus(): Promise<PrinterStatus> {
    return this.printerManager.getStatus();
  }

  async listJobs(): Promise<JobListing> {
    return {
      active: await this.printerManager.listJobs(),
      history: this.printerManager.tracker.list(),
    };
  }

  getJobStatus(jobId: number): Promise<JobStatus> {
    return this.printerManager.getJobStatus(jobId);
  }

  cancelJob(jobId: number): Promise<void> {
    return this.printerManager.cancelJob(jobId);
  }

  private async disconnectMailbox(): Promise<void> {
    try {
      await this.mailbox.disconnect();
    } catch (error: unknown) {
      logger.warn('Mailbox disconnect failed', { error: errorMessage(error) });
    }
  }

  private logStatistics(): void {
    const report = this.stats.report();
    logger.info('Service statistics', {
      uptime: report.uptimeFormatted,
      emailsProcessed: report.emailsProcessed,
      emailsPrinted: report.emailsPrinted,
      emailsSkipped: report.emailsSkipped,
      documentsRejected: report.documentsRejected,
      printJobsFailed: report.printJobsFailed,
      successRate: `${this.stats.successRate()}%`,
    });
  }
}
