// ============================================================================
// Mailbox
// ============================================================================

export type MailboxFlag = 'seen' | 'deleted';

export interface MailboxConnectionConfig {
  host: string;
  port: number;
  secure: boolean;
  username: string;
  password: string;
}

export interface UnseenSearchCriteria {
  /** Messages must come from one of these senders (empty: any sender) */
  allowedSenders: string[];
  /** Messages from these senders are excluded */
  blockedSenders: string[];
}

/**
 * Mailbox access used by the poller. Message ids are UIDs of the selected folder.
 */
export interface MailboxClient {
  readonly isConnected: boolean;
  connect(): Promise<void>;
  selectFolder(folder: string): Promise<void>;
  searchUnseen(criteria: UnseenSearchCriteria): Promise<number[]>;
  /** Full RFC 822 source of the message */
  fetch(id: number): Promise<Buffer>;
  setFlag(id: number, flag: MailboxFlag): Promise<void>;
  /** Permanently remove every message flagged deleted since the last expunge */
  expunge(): Promise<void>;
  disconnect(): Promise<void>;
}

// ============================================================================
// Print spooler
// ============================================================================

export type SpoolerKind = 'ipp' | 'lp';

export type JobState =
  | 'pending'
  | 'held'
  | 'processing'
  | 'stopped'
  | 'canceled'
  | 'aborted'
  | 'completed'
  | 'unknown';

export const TERMINAL_JOB_STATES: ReadonlySet<JobState> = new Set<JobState>([
  'completed',
  'canceled',
  'aborted',
]);

export interface SpoolOptions {
  /** Paper size name, e.g. A4 or Letter */
  media: string;
  orientation: string;
  quality: string;
  duplex: boolean;
  color: boolean;
}

export interface SpoolerJob {
  id: number;
  printer: string;
  title: string;
  state: JobState;
  user?: string;
}

export type PrinterState = 'idle' | 'processing' | 'stopped' | 'unknown';

export interface PrinterInfo {
  name: string;
  state: PrinterState;
  description?: string;
}

export interface SpoolerClient {
  readonly kind: SpoolerKind;
  /** Whether job ids returned by submit can be followed through getJobs */
  readonly supportsJobTracking: boolean;
  /** Returns the spooler job id when one is reported */
  submit(
    printer: string,
    filePath: string,
    title: string,
    options: SpoolOptions,
    documentFormat?: string
  ): Promise<number | null>;
  /** Active (not yet completed) jobs */
  getJobs(printer?: string): Promise<SpoolerJob[]>;
  cancel(jobId: number): Promise<void>;
  listPrinters(): Promise<PrinterInfo[]>;
  getDefaultPrinter(): Promise<string | null>;
}
