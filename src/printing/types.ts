import { JobState, PrinterInfo, SpoolerJob, SpoolerKind } from '../connectors/types';

/**
 * Local lifecycle of a submission:
 * submitted -> processing -> completed | canceled | aborted.
 * `failed` marks a submission no spooler accepted.
 */
export type PrintJobState = 'submitted' | 'processing' | 'completed' | 'canceled' | 'aborted' | 'failed';

export interface PrintJob {
  /** Local id, unique within this process */
  id: string;
  /** Spooler-assigned id, when the spooler reported one */
  jobId: number | null;
  title: string;
  sourceFile: string;
  printer: string;
  spooler: SpoolerKind | null;
  state: PrintJobState;
  submittedAt: Date;
  updatedAt: Date;
  completedAt?: Date;
  error?: string;
}

export interface PrintSubmission {
  job: PrintJob;
  /** The spooler can report on this job by id */
  tracked: boolean;
}

/** How waiting on a tracked job ended */
export type JobWaitOutcome = 'completed' | 'canceled' | 'aborted' | 'timeout' | 'unknown';

export interface PrinterStatus {
  printer: string | null;
  online: boolean;
  spooler: SpoolerKind;
  availablePrinters: PrinterInfo[];
  activeJobs: SpoolerJob[];
}

export interface JobStatus {
  jobId: number;
  state: JobState;
  printer?: string;
  title?: string;
  /** Local submission record, when this process submitted the job */
  local?: PrintJob;
}
