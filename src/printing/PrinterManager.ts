/**
 * Printer Manager
 *
 * Single entry point to the print spooler. Prefers CUPS over IPP and falls
 * back to the command-line tools when IPP is unavailable or fails. Classifies
 * files before submission and enforces the page limit.
 */

import path from 'path';
import { ServiceSettings } from '../config/serviceConfig';
import { IppSpoolerClient } from '../connectors/IppSpoolerClient';
import { LpSpoolerClient } from '../connectors/LpSpoolerClient';
import {
  JobState,
  PrinterInfo,
  SpoolOptions,
  SpoolerClient,
  SpoolerJob,
  TERMINAL_JOB_STATES,
} from '../connectors/types';
import { PrintError, errorMessage } from '../errors';
import { renderImageToPdf } from '../rendering/imageToPdf';
import { estimatePageCount } from '../rendering/pageCount';
import { resolveContentType } from '../utils/fileHelpers';
import { siblingWithExtension } from '../utils/fileNaming';
import logger from '../utils/logger';
import { TIMED_OUT, withTimeout } from '../utils/withTimeout';
import { PrintJobTracker } from './PrintJobTracker';
import { defaultSpoolOptions } from './printOptions';
import { JobStatus, JobWaitOutcome, PrintJobState, PrintSubmission, PrinterStatus } from './types';

const CONVERTIBLE_IMAGE_TYPES = new Set(['image/png', 'image/jpeg']);

const LOCAL_JOB_STATES: Record<PrintJobState, JobState> = {
  submitted: 'pending',
  processing: 'processing',
  completed: 'completed',
  canceled: 'canceled',
  aborted: 'aborted',
  failed: 'aborted',
};

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface PrinterManagerOptions {
  printer: ServiceSettings['printer'];
  processing: Pick<
    ServiceSettings['processing'],
    'max_pages_per_document' | 'job_wait_timeout' | 'job_poll_interval_ms'
  >;
  /** IPP client; pass null to use the command-line tools only */
  ipp?: SpoolerClient | null;
  lp?: SpoolerClient;
  tracker?: PrintJobTracker;
  sleep?: Sleep;
  /** Clock for job wait deadlines, in milliseconds */
  now?: () => number;
}

export class PrinterManager {
  private ipp: SpoolerClient | null;
  private readonly lp: SpoolerClient;
  private readonly printerSettings: ServiceSettings['printer'];
  private readonly processing: PrinterManagerOptions['processing'];
  private readonly sleep: Sleep;
  private readonly now: () => number;
  readonly tracker: PrintJobTracker;
  private resolvedPrinter: string | null = null;

  constructor(options: PrinterManagerOptions) {
    this.printerSettings = options.printer;
    this.processing = options.processing;
    this.ipp =
      options.ipp === undefined ? new IppSpoolerClient(options.printer.cups_url) : options.ipp;
    this.lp = options.lp ?? new LpSpoolerClient();
    this.tracker = options.tracker ?? new PrintJobTracker();
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /** Printer resolved by the last getDefaultPrinter() call */
  get activePrinter(): string | null {
    return this.resolvedPrinter;
  }

  /** Spooler used for queries */
  get spooler(): SpoolerClient {
    return this.ipp ?? this.lp;
  }

  get defaultOptions(): SpoolOptions {
    return defaultSpoolOptions(this.printerSettings);
  }

  /**
   * Probe the IPP endpoint; drop to the command-line tools when it does not answer.
   */
  async initialize(): Promise<void> {
    if (!this.ipp) {
      logger.info('Using command-line print tools');
      return;
    }

    try {
      await this.ipp.listPrinters();
      logger.info('Connected to CUPS over IPP', { url: this.printerSettings.cups_url });
    } catch (error: unknown) {
      logger.warn('CUPS IPP endpoint unavailable, using command-line print tools', {
        url: this.printerSettings.cups_url,
        error: errorMessage(error),
      });
      this.ipp = null;
    }
  }

  /**
   * Run a spooler query on IPP, falling back to the command-line tools.
   */
  private async query<T>(operation: string, fn: (client: SpoolerClient) => Promise<T>): Promise<T> {
    if (this.ipp) {
      try {
        return await fn(this.ipp);
      } catch (error: unknown) {
        logger.warn(`IPP ${operation} failed, trying command-line tools`, {
          error: errorMessage(error),
        });
      }
    }
    return fn(this.lp);
  }

  async listPrinters(): Promise<PrinterInfo[]> {
    return this.query('list printers', (client) => client.listPrinters());
  }

  /**
   * Configured printer unless it is `default`; otherwise the spooler's
   * default; otherwise the first printer the spooler knows.
   */
  async getDefaultPrinter(): Promise<string | null> {
    const configured = this.printerSettings.name.trim();
    if (configured && configured.toLowerCase() !== 'default') {
      this.resolvedPrinter = configured;
      return configured;
    }

    let printer: string | null = null;
    try {
      printer = await this.query('get default printer', (client) => client.getDefaultPrinter());
    } catch (error: unknown) {
      logger.warn('Could not read the default printer', { error: errorMessage(error) });
    }

    if (!printer) {
      try {
        const printers = await this.listPrinters();
        printer = printers.length > 0 ? printers[0].name : null;
      } catch (error: unknown) {
        logger.warn('Could not list printers', { error: errorMessage(error) });
      }
    }

    this.resolvedPrinter = printer;
    return printer;
  }

  /**
   * The default printer exists in the spooler's printer list.
   */
  async testConnection(): Promise<boolean> {
    try {
      const printer = await this.getDefaultPrinter();
      if (!printer) {
        logger.error('No printer available');
        return false;
      }
      const printers = await this.listPrinters();
      const found = printers.some((info) => info.name === printer);
      if (!found) {
        logger.error('Printer not found in spooler', {
          printer,
          available: printers.map((info) => info.name),
        });
        return false;
      }
      logger.info('Printer connection test passed', { printer });
      return true;
    } catch (error: unknown) {
      logger.error('Printer connection test failed', { error: errorMessage(error) });
      return false;
    }
  }

  /**
   * Submit a file after classifying it by content type. PNG and JPEG images
   * are converted to PDF beside the source; the caller owns the directory.
   */
  async printFile(filePath: string, title: string, declaredType?: string): Promise<PrintSubmission> {
    const contentType = resolveContentType(declaredType, filePath);
    const defaults = this.defaultOptions;

    if (contentType === 'application/pdf') {
      return this.submit(filePath, title, { ...defaults, orientation: 'portrait' }, contentType);
    }

    if (CONVERTIBLE_IMAGE_TYPES.has(contentType)) {
      const pdfPath = await renderImageToPdf(filePath, siblingWithExtension(filePath, '.pdf'));
      logger.debug('Converted image to PDF', { source: path.basename(filePath) });
      return this.submit(
        pdfPath,
        title,
        { ...defaults, media: 'A4', orientation: 'portrait' },
        'application/pdf'
      );
    }

    if (contentType.startsWith('image/')) {
      throw PrintError.unsupportedType(contentType, filePath);
    }

    return this.submit(filePath, title, defaults, contentType);
  }

  /**
   * Reject documents whose estimated page count exceeds the limit.
   */
  async checkPageLimit(filePath: string, contentType: string): Promise<void> {
    const maxPages = this.processing.max_pages_per_document;
    if (maxPages <= 0) return;

    const pages = await estimatePageCount(filePath, contentType);
    if (pages > maxPages) {
      throw PrintError.pageLimitExceeded(filePath, pages, maxPages);
    }
  }

  /**
   * Hand a file to the spooler. Every submission is recorded in the job
   * history, failed ones included.
   */
  async submit(
    filePath: string,
    title: string,
    options: SpoolOptions,
    contentType: string
  ): Promise<PrintSubmission> {
    await this.checkPageLimit(filePath, contentType);

    const printer = await this.getDefaultPrinter();
    if (!printer) {
      throw PrintError.noPrinter();
    }

    const clients = this.ipp ? [this.ipp, this.lp] : [this.lp];
    let lastError: Error | undefined;

    for (const client of clients) {
      try {
        const jobId = await client.submit(printer, filePath, title, options, contentType);
        const job = this.tracker.record({
          jobId,
          title,
          sourceFile: filePath,
          printer,
          spooler: client.kind,
        });
        logger.info('Print job submitted', { title, printer, jobId, spooler: client.kind });
        return { job, tracked: client.supportsJobTracking && jobId !== null };
      } catch (error: unknown) {
        lastError = error instanceof Error ? error : new Error(String(error));
        logger.warn(`Print submission via ${client.kind} failed`, {
          title,
          printer,
          error: lastError.message,
        });
      }
    }

    this.tracker.record({
      jobId: null,
      title,
      sourceFile: filePath,
      printer,
      spooler: null,
      state: 'failed',
      error: lastError?.message,
    });
    throw PrintError.submitFailed(title, lastError);
  }

  /**
   * Poll the spooler until a tracked job finishes, leaves the active
   * listing, or job_wait_timeout elapses. A spooler that stops answering
   * counts against the same deadline. A timeout is not a failure.
   */
  async waitForJob(submission: PrintSubmission): Promise<JobWaitOutcome> {
    const { job } = submission;
    const ipp = this.ipp;
    if (!submission.tracked || job.jobId === null || !ipp) {
      return 'unknown';
    }

    const intervalMs = Math.min(this.processing.job_poll_interval_ms, 1000);
    const deadline = this.now() + this.processing.job_wait_timeout * 1000;

    for (;;) {
      let active: SpoolerJob[] | typeof TIMED_OUT;
      try {
        active = await withTimeout(ipp.getJobs(job.printer), deadline - this.now());
      } catch (error: unknown) {
        logger.warn('Could not read job state', { jobId: job.jobId, error: errorMessage(error) });
        return 'unknown';
      }
      if (active === TIMED_OUT) break;

      const current = active.find((entry) => entry.id === job.jobId);
      if (!current) {
        this.tracker.updateState(job.id, 'completed');
        return 'completed';
      }
      if (
        current.state === 'completed' ||
        current.state === 'canceled' ||
        current.state === 'aborted'
      ) {
        this.tracker.updateState(job.id, current.state);
        return current.state;
      }
      if (job.state !== 'processing') {
        this.tracker.updateState(job.id, 'processing');
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) break;
      await this.sleep(Math.min(intervalMs, remaining));
    }

    logger.info('Timed out waiting for print job', { jobId: job.jobId, title: job.title });
    return 'timeout';
  }

  async listJobs(): Promise<SpoolerJob[]> {
    return this.query('list jobs', (client) => client.getJobs());
  }

  async getJobStatus(jobId: number): Promise<JobStatus> {
    const active = await this.listJobs();
    const current = active.find((entry) => entry.id === jobId);
    const local = this.tracker.findBySpoolerId(jobId);

    if (current) {
      return { jobId, state: current.state, printer: current.printer, title: current.title, local };
    }
    if (local) {
      // Jobs leave the active listing once they finish
      const state = LOCAL_JOB_STATES[local.state];
      return {
        jobId,
        state: TERMINAL_JOB_STATES.has(state) ? state : 'completed',
        printer: local.printer,
        title: local.title,
        local,
      };
    }

    throw new PrintError(`Print job ${jobId} not found`, 'PRINT_005', { jobId }, 404);
  }

  async cancelJob(jobId: number): Promise<void> {
    try {
      await this.query('cancel job', (client) => client.cancel(jobId));
    } catch (error: unknown) {
      throw PrintError.jobOperationFailed(jobId, 'cancel', error instanceof Error ? error : undefined);
    }

    const local = this.tracker.findBySpoolerId(jobId);
    if (local) this.tracker.updateState(local.id, 'canceled');
    logger.info('Print job canceled', { jobId });
  }

  async getStatus(): Promise<PrinterStatus> {
    const printer = await this.getDefaultPrinter();
    let availablePrinters: PrinterInfo[] = [];
    let activeJobs: SpoolerJob[] = [];
    let online = false;

    try {
      availablePrinters = await this.listPrinters();
      const info = availablePrinters.find((entry) => entry.name === printer);
      online = info !== undefined && info.state !== 'stopped';
      activeJobs = printer ? await this.query('list jobs', (client) => client.getJobs(printer)) : [];
    } catch (error: unknown) {
      logger.warn('Could not read printer status', { error: errorMessage(error) });
    }

    return { printer, online, spooler: this.spooler.kind, availablePrinters, activeJobs };
  }
}
