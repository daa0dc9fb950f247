/**
 * In-process stand-ins for the mailbox, the spooler and the HTML renderer.
 */

import { promises as fs } from 'fs';
import {
  MailboxClient,
  MailboxFlag,
  PrinterInfo,
  SpoolOptions,
  SpoolerClient,
  SpoolerJob,
  SpoolerKind,
  UnseenSearchCriteria,
} from '../../connectors/types';
import { EmailAttachment, EmailMessage } from '../../parsing/types';
import { HtmlRenderOptions, HtmlRenderer } from '../../rendering/HtmlRenderer';

/** Shared call log so tests can assert ordering across fakes */
export type EventLog = string[];

export class FakeMailbox implements MailboxClient {
  connected = false;
  messages = new Map<number, Buffer>();
  searchResult: number[] = [];
  criteria: UnseenSearchCriteria[] = [];
  flags: Array<{ id: number; flag: MailboxFlag }> = [];
  expungeCount = 0;
  connectCount = 0;
  disconnectCount = 0;
  failConnect = false;
  failSearch = false;
  failFetch = new Set<number>();
  failFlag = false;

  constructor(private readonly events: EventLog = []) {}

  get isConnected(): boolean {
    return this.connected;
  }

  addMessage(id: number, raw: string): void {
    this.messages.set(id, Buffer.from(raw));
    this.searchResult.push(id);
  }

  async connect(): Promise<void> {
    this.connectCount++;
    if (this.failConnect) throw new Error('connection refused');
    this.connected = true;
    this.events.push('connect');
  }

  async selectFolder(folder: string): Promise<void> {
    this.events.push(`select:${folder}`);
  }

  async searchUnseen(criteria: UnseenSearchCriteria): Promise<number[]> {
    if (this.failSearch) throw new Error('search failed');
    this.criteria.push(criteria);
    return [...this.searchResult];
  }

  async fetch(id: number): Promise<Buffer> {
    if (this.failFetch.has(id)) throw new Error(`fetch ${id} failed`);
    const raw = this.messages.get(id);
    if (!raw) throw new Error(`no message ${id}`);
    return raw;
  }

  async setFlag(id: number, flag: MailboxFlag): Promise<void> {
    if (this.failFlag) throw new Error('flag failed');
    this.flags.push({ id, flag });
    this.events.push(`flag:${id}:${flag}`);
  }

  async expunge(): Promise<void> {
    this.expungeCount++;
    this.events.push('expunge');
  }

  async disconnect(): Promise<void> {
    this.disconnectCount++;
    this.connected = false;
  }
}

export interface FakeSubmission {
  printer: string;
  filePath: string;
  title: string;
  options: SpoolOptions;
  documentFormat?: string;
  /** File contents at submission time */
  content: Buffer;
}

export class FakeSpooler implements SpoolerClient {
  submissions: FakeSubmission[] = [];
  printers: PrinterInfo[] = [{ name: 'Office', state: 'idle' }];
  defaultPrinter: string | null = 'Office';
  activeJobs: SpoolerJob[] = [];
  /** Successive getJobs() answers; the last one repeats */
  jobListings: SpoolerJob[][] = [];
  canceled: number[] = [];
  nextJobId = 1;
  returnJobIds = true;
  failSubmit = false;
  failSubmitTitles = new Set<string>();
  failQueries = false;
  getJobsCalls = 0;

  constructor(
    readonly kind: SpoolerKind = 'lp',
    readonly supportsJobTracking = false,
    private readonly events: EventLog = []
  ) {}

  async submit(
    printer: string,
    filePath: string,
    title: string,
    options: SpoolOptions,
    documentFormat?: string
  ): Promise<number | null> {
    if (this.failSubmit || this.failSubmitTitles.has(title)) {
      throw new Error(`${this.kind} submit failed`);
    }
    const content = await fs.readFile(filePath);
    this.submissions.push({ printer, filePath, title, options, documentFormat, content });
    this.events.push(`print:${title}`);
    return this.returnJobIds ? this.nextJobId++ : null;
  }

  async getJobs(): Promise<SpoolerJob[]> {
    this.getJobsCalls++;
    if (this.failQueries) throw new Error(`${this.kind} unavailable`);
    if (this.jobListings.length > 1) {
      return this.jobListings.shift() ?? [];
    }
    if (this.jobListings.length === 1) {
      return this.jobListings[0];
    }
    return this.activeJobs;
  }

  async cancel(jobId: number): Promise<void> {
    if (this.failQueries) throw new Error(`${this.kind} unavailable`);
    this.canceled.push(jobId);
  }

  async listPrinters(): Promise<PrinterInfo[]> {
    if (this.failQueries) throw new Error(`${this.kind} unavailable`);
    return this.printers;
  }

  async getDefaultPrinter(): Promise<string | null> {
    if (this.failQueries) throw new Error(`${this.kind} unavailable`);
    return this.defaultPrinter;
  }
}

export class FakeHtmlRenderer implements HtmlRenderer {
  rendered: Array<{ htmlPath: string; html: string; options: HtmlRenderOptions }> = [];
  fail = false;

  async render(htmlPath: string, pdfPath: string, options: HtmlRenderOptions): Promise<void> {
    if (this.fail) throw new Error('renderer crashed');
    const html = await fs.readFile(htmlPath, 'utf-8');
    this.rendered.push({ htmlPath, html, options });
    await fs.writeFile(pdfPath, '%PDF-1.4 fake');
  }
}

export const noSleep = async (_ms: number): Promise<void> => undefined;

export function makeAttachment(overrides: Partial<EmailAttachment> = {}): EmailAttachment {
  const data = overrides.data ?? Buffer.from('attachment body\n');
  return {
    filename: 'notes.txt',
    contentType: 'text/plain',
    sizeBytes: data.length,
    data,
    ...overrides,
  };
}

export function makeMessage(overrides: Partial<EmailMessage> = {}): EmailMessage {
  return {
    messageId: '<msg-1@example.test>',
    subject: 'Quarterly report',
    sender: 'Alice <alice@example.test>',
    recipient: 'printer@example.test',
    date: 'Mon, 1 Jan 2024 10:00:00 +0000',
    textBody: 'Hello printer',
    htmlBody: '',
    attachments: [],
    ...overrides,
  };
}

export interface RawAttachment {
  filename: string;
  contentType: string;
  content: Buffer;
}

export interface RawEmailOptions {
  messageId?: string;
  subject?: string;
  from?: string;
  to?: string;
  date?: string;
  text?: string;
  html?: string;
  attachments?: RawAttachment[];
}

/**
 * Build an RFC 822 message. Parts are joined with CRLF.
 */
export function buildRawEmail(options: RawEmailOptions = {}): string {
  const boundary = 'test-boundary-42';
  const headers = [
    `From: ${options.from ?? 'Alice <alice@example.test>'}`,
    `To: ${options.to ?? 'printer@example.test'}`,
    `Subject: ${options.subject ?? 'Quarterly report'}`,
    `Date: ${options.date ?? 'Mon, 1 Jan 2024 10:00:00 +0000'}`,
  ];
  if (options.messageId !== '') {
    headers.push(`Message-ID: ${options.messageId ?? '<msg-1@example.test>'}`);
  }
  headers.push('MIME-Version: 1.0');

  const parts: string[] = [];
  if (options.text !== undefined) {
    parts.push(
      ['Content-Type: text/plain; charset=utf-8', 'Content-Transfer-Encoding: 8bit', '', options.text].join('\r\n')
    );
  }
  if (options.html !== undefined) {
    parts.push(
      ['Content-Type: text/html; charset=utf-8', 'Content-Transfer-Encoding: 8bit', '', options.html].join('\r\n')
    );
  }
  for (const attachment of options.attachments ?? []) {
    parts.push(
      [
        `Content-Type: ${attachment.contentType}; name="${attachment.filename}"`,
        `Content-Disposition: attachment; filename="${attachment.filename}"`,
        'Content-Transfer-Encoding: base64',
        '',
        attachment.content.toString('base64'),
      ].join('\r\n')
    );
  }

  headers.push(`Content-Type: multipart/mixed; boundary="${boundary}"`);
  const body = parts.map((part) => `--${boundary}\r\n${part}\r\n`).join('') + `--${boundary}--\r\n`;
  return `${headers.join('\r\n')}\r\n\r\n${body}`;
}

/** 1x1 transparent PNG */
export const ONE_PIXEL_PNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==',
  'base64'
);

/** Poll every 5ms until the condition holds or the timeout passes */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition() && Date.now() < deadline) {
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
