import { buildLpArgs } from '../printing/printOptions';
import { CommandRunner, runCommand } from '../utils/commandRunner';
import { PrinterInfo, SpoolOptions, SpoolerClient, SpoolerJob } from './types';

const REQUEST_ID_PATTERN = /request id is (.+)-(\d+)/;
const JOB_LINE_PATTERN = /^(\S+)-(\d+)\s+(\S+)/;
const PRINTER_LINE_PATTERN = /^printer\s+(\S+)\s+(.*)$/;
const DEFAULT_LINE_PATTERN = /system default destination:\s*(\S+)/;

/**
 * Extract the job id from `lp` output ("request id is Office-42 (1 file(s))").
 */
export function parseRequestId(output: string): number | null {
  const match = output.match(REQUEST_ID_PATTERN);
  return match ? parseInt(match[2], 10) : null;
}

function parsePrinterState(description: string): PrinterInfo['state'] {
  if (description.startsWith('is idle')) return 'idle';
  if (description.startsWith('now printing')) return 'processing';
  if (description.startsWith('disabled')) return 'stopped';
  return 'unknown';
}

/**
 * Spooler access through the CUPS command-line tools. `lp` does not let us
 * follow a job once submitted, so tracking is left to the fixed wait.
 */
export class LpSpoolerClient implements SpoolerClient {
  readonly kind = 'lp' as const;
  readonly supportsJobTracking = false;

  constructor(private readonly run: CommandRunner = runCommand) {}

  async submit(
    printer: string,
    filePath: string,
    title: string,
    options: SpoolOptions
  ): Promise<number | null> {
    const { stdout } = await this.run('lp', buildLpArgs(printer, filePath, title, options));
    return parseRequestId(stdout);
  }

  async getJobs(printer?: string): Promise<SpoolerJob[]> {
    const args = printer ? ['-o', printer] : ['-o'];
    const { stdout } = await this.run('lpstat', args);
    const jobs: SpoolerJob[] = [];

    for (const line of stdout.split('\n')) {
      const match = line.trim().match(JOB_LINE_PATTERN);
      if (!match) continue;
      jobs.push({
        id: parseInt(match[2], 10),
        printer: match[1],
        title: '',
        state: 'pending',
        user: match[3],
      });
    }

    return jobs;
  }

  async cancel(jobId: number): Promise<void> {
    await this.run('cancel', [String(jobId)]);
  }

  async listPrinters(): Promise<PrinterInfo[]> {
    const { stdout } = await this.run('lpstat', ['-p']);
    const printers: PrinterInfo[] = [];

    for (const line of stdout.split('\n')) {
      const match = line.trim().match(PRINTER_LINE_PATTERN);
      if (!match) continue;
      printers.push({ name: match[1], state: parsePrinterState(match[2]) });
    }

    return printers;
  }

  async getDefaultPrinter(): Promise<string | null> {
    const { stdout } = await this.run('lpstat', ['-d']);
    const match = stdout.match(DEFAULT_LINE_PATTERN);
    return match ? match[1] : null;
  }
}
