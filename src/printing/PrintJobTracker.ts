/**
 * Print Job Tracker
 *
 * In-memory history of print submissions made by this process.
 * Lost on restart.
 */

import { SpoolerKind } from '../connectors/types';
import logger from '../utils/logger';
import { PrintJob, PrintJobState } from './types';

const MAX_TRACKED_JOBS = 100;

const FINISHED_STATES: ReadonlySet<PrintJobState> = new Set<PrintJobState>([
  'completed',
  'canceled',
  'aborted',
  'failed',
]);

/**
 * Generate a unique local job ID
 */
function generateJobId(): string {
  return `job_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
}

export interface NewPrintJob {
  jobId: number | null;
  title: string;
  sourceFile: string;
  printer: string;
  spooler: SpoolerKind | null;
  state?: PrintJobState;
  error?: string;
}

export class PrintJobTracker {
  private readonly jobs = new Map<string, PrintJob>();

  constructor(private readonly maxJobs = MAX_TRACKED_JOBS) {}

  record(input: NewPrintJob): PrintJob {
    const now = new Date();
    const job: PrintJob = {
      id: generateJobId(),
      jobId: input.jobId,
      title: input.title,
      sourceFile: input.sourceFile,
      printer: input.printer,
      spooler: input.spooler,
      state: input.state ?? 'submitted',
      submittedAt: now,
      updatedAt: now,
      error: input.error,
    };
    if (FINISHED_STATES.has(job.state)) {
      job.completedAt = now;
    }

    this.jobs.set(job.id, job);
    logger.debug(`Print job recorded: ${job.id}`, { jobId: job.jobId, title: job.title });

    this.cleanupOldJobs();
    return job;
  }

  updateState(id: string, state: PrintJobState, error?: string): void {
    const job = this.jobs.get(id);
    if (!job) {
      logger.warn(`Print job not found: ${id}`);
      return;
    }

    job.state = state;
    job.updatedAt = new Date();
    if (error) job.error = error;
    if (FINISHED_STATES.has(state)) {
      job.completedAt = job.updatedAt;
    }
  }

  get(id: string): PrintJob | undefined {
    return this.jobs.get(id);
  }

  findBySpoolerId(jobId: number): PrintJob | undefined {
    let found: PrintJob | undefined;
    for (const job of this.jobs.values()) {
      if (job.jobId === jobId) found = job;
    }
    return found;
  }

  /** Most recent first */
  list(): PrintJob[] {
    return [...this.jobs.values()].reverse();
  }

  get size(): number {
    return this.jobs.size;
  }

  /**
   * Drop the oldest entries beyond the limit, finished ones first.
   */
  private cleanupOldJobs(): void {
    if (this.jobs.size <= this.maxJobs) return;

    for (const [id, job] of this.jobs) {
      if (this.jobs.size <= this.maxJobs) return;
      if (FINISHED_STATES.has(job.state)) this.jobs.delete(id);
    }
    for (const id of this.jobs.keys()) {
      if (this.jobs.size <= this.maxJobs) return;
      this.jobs.delete(id);
    }
  }
}
