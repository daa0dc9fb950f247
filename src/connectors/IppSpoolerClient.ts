import { promises as fs } from 'fs';
import os from 'os';
import { IppGroup, IppRequest, IppResponse, IppValue, Printer } from 'ipp';
import { toIppJobAttributes } from '../printing/printOptions';
import { TIMED_OUT, withTimeout } from '../utils/withTimeout';
import { JobState, PrinterInfo, SpoolOptions, SpoolerClient, SpoolerJob } from './types';

export type IppTransport = (
  url: string,
  operation: string,
  message: IppRequest | null
) => Promise<IppResponse>;

export const IPP_REQUEST_TIMEOUT_MS = 30000;

export const executeIpp: IppTransport = async (url, operation, message) => {
  const request = new Promise<IppResponse>((resolve, reject) => {
    new Printer(url).execute(operation, message, (error, response) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(response);
    });
  });

  const result = await withTimeout(request, IPP_REQUEST_TIMEOUT_MS);
  if (result === TIMED_OUT) {
    throw new Error(`IPP ${operation} timed out after ${IPP_REQUEST_TIMEOUT_MS}ms`);
  }
  return result;
};

const JOB_STATES: Record<string, JobState> = {
  pending: 'pending',
  'pending-held': 'held',
  processing: 'processing',
  'processing-stopped': 'stopped',
  canceled: 'canceled',
  aborted: 'aborted',
  completed: 'completed',
};

const PRINTER_STATES: Record<string, PrinterInfo['state']> = {
  idle: 'idle',
  processing: 'processing',
  stopped: 'stopped',
};

function groups(value: IppGroup | IppGroup[] | undefined): IppGroup[] {
  if (!value) return [];
  return Array.isArray(value) ? value : [value];
}

function text(value: IppValue | undefined): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function integer(value: IppValue | undefined): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^\d+$/.test(value)) return parseInt(value, 10);
  return undefined;
}

function assertSuccess(operation: string, response: IppResponse): void {
  const status = response.statusCode ?? 'unknown';
  if (!status.startsWith('successful')) {
    throw new Error(`IPP ${operation} failed with status ${status}`);
  }
}

/**
 * Spooler access through CUPS over IPP. Jobs can be followed by id.
 */
export class IppSpoolerClient implements SpoolerClient {
  readonly kind = 'ipp' as const;
  readonly supportsJobTracking = true;
  private readonly baseUrl: string;
  private readonly userName: string;

  constructor(cupsUrl: string, private readonly transport: IppTransport = executeIpp) {
    this.baseUrl = cupsUrl.replace(/\/+$/, '');
    this.userName = os.userInfo().username;
  }

  private printerUrl(printer: string): string {
    return `${this.baseUrl}/printers/${encodeURIComponent(printer)}`;
  }

  private async call(url: string, operation: string, message: IppRequest | null): Promise<IppResponse> {
    const response = await this.transport(url, operation, message);
    assertSuccess(operation, response);
    return response;
  }

  async submit(
    printer: string,
    filePath: string,
    title: string,
    options: SpoolOptions,
    documentFormat = 'application/octet-stream'
  ): Promise<number | null> {
    const data = await fs.readFile(filePath);
    const response = await this.call(this.printerUrl(printer), 'Print-Job', {
      'operation-attributes-tag': {
        'requesting-user-name': this.userName,
        'job-name': title,
        'document-format': documentFormat,
      },
      'job-attributes-tag': toIppJobAttributes(options),
      data,
    });

    const [job] = groups(response['job-attributes-tag']);
    return integer(job?.['job-id']) ?? null;
  }

  async getJobs(printer?: string): Promise<SpoolerJob[]> {
    const url = printer ? this.printerUrl(printer) : `${this.baseUrl}/`;
    const response = await this.call(url, 'Get-Jobs', {
      'operation-attributes-tag': {
        'requesting-user-name': this.userName,
        'which-jobs': 'not-completed',
        'requested-attributes': [
          'job-id',
          'job-name',
          'job-state',
          'job-printer-uri',
          'job-originating-user-name',
        ],
      },
    });

    const jobs: SpoolerJob[] = [];
    for (const group of groups(response['job-attributes-tag'])) {
      const id = integer(group['job-id']);
      if (id === undefined) continue;
      const printerUri = text(group['job-printer-uri']) ?? '';
      jobs.push({
        id,
        printer: printer ?? decodeURIComponent(printerUri.split('/').pop() ?? ''),
        title: text(group['job-name']) ?? '',
        state: JOB_STATES[text(group['job-state']) ?? ''] ?? 'unknown',
        user: text(group['job-originating-user-name']),
      });
    }
    return jobs;
  }

  async cancel(jobId: number): Promise<void> {
    await this.call(`${this.baseUrl}/`, 'Cancel-Job', {
      'operation-attributes-tag': {
        'requesting-user-name': this.userName,
        'job-id': jobId,
      },
    });
  }

  async listPrinters(): Promise<PrinterInfo[]> {
    const response = await this.call(`${this.baseUrl}/`, 'CUPS-Get-Printers', {
      'operation-attributes-tag': {
        'requested-attributes': ['printer-name', 'printer-state', 'printer-info'],
      },
    });

    const printers: PrinterInfo[] = [];
    for (const group of groups(response['printer-attributes-tag'])) {
      const name = text(group['printer-name']);
      if (!name) continue;
      printers.push({
        name,
        state: PRINTER_STATES[text(group['printer-state']) ?? ''] ?? 'unknown',
        description: text(group['printer-info']),
      });
    }
    return printers;
  }

  async getDefaultPrinter(): Promise<string | null> {
    const response = await this.call(`${this.baseUrl}/`, 'CUPS-Get-Default', {
      'operation-attributes-tag': {
        'requested-attributes': ['printer-name'],
      },
    });
    const [printer] = groups(response['printer-attributes-tag']);
    return text(printer?.['printer-name']) ?? null;
  }
}
