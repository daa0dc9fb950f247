/**
 * Print Orchestrator
 *
 * Decides what to print for each accepted message and drives it through the
 * printer manager. A message prints either its attachments or its body,
 * never both. Failures stay inside the message that caused them.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { ServiceSettings } from '../config/serviceConfig';
import { errorMessage, isPrintRejection } from '../errors';
import { EmailAttachment, EmailMessage } from '../parsing/types';
import { PrinterManager, Sleep } from '../printing/PrinterManager';
import { PrintSubmission } from '../printing/types';
import { HtmlRenderer } from '../rendering/HtmlRenderer';
import { buildHtmlDocument } from '../rendering/htmlPreprocessor';
import { generateUniqueFileName, toSafeFileName } from '../utils/fileNaming';
import logger from '../utils/logger';
import { withTempDirectory } from '../utils/tempFiles';
import { ServiceStats } from './serviceStats';

const HEADER_RULE = '='.repeat(50);
const TEMP_DIR_PREFIX = 'mail-print-';

type AttachmentWait = ServiceSettings['processing']['attachment_wait'];

export interface PrintOrchestratorOptions {
  printerManager: PrinterManager;
  htmlRenderer: HtmlRenderer;
  processing: ServiceSettings['processing'];
  printer: ServiceSettings['printer'];
  stats: ServiceStats;
  sleep?: Sleep;
}

/**
 * Seconds to hold temporary files for submissions the spooler cannot report on.
 */
export function computeAttachmentWaitSeconds(untrackedCount: number, wait: AttachmentWait): number {
  if (untrackedCount <= 0) return 0;
  return Math.min(wait.base_seconds + untrackedCount * wait.per_attachment_seconds, wait.max_seconds);
}

/**
 * Plain-text header printed above every message body.
 */
export function buildMessageHeader(message: EmailMessage): string {
  return [
    `From: ${message.sender}`,
    `To: ${message.recipient}`,
    `Subject: ${message.subject}`,
    `Date: ${message.date}`,
    '',
    HEADER_RULE,
    '',
    '',
  ].join('\n');
}

export function messageTitle(message: EmailMessage): string {
  return `Email: ${message.subject}`;
}

export function attachmentTitle(attachment: EmailAttachment): string {
  return `Attachment: ${attachment.filename}`;
}

export class PrintOrchestrator {
  private readonly printerManager: PrinterManager;
  private readonly htmlRenderer: HtmlRenderer;
  private readonly processing: ServiceSettings['processing'];
  private readonly printer: ServiceSettings['printer'];
  private readonly stats: ServiceStats;
  private readonly sleep: Sleep;

  constructor(options: PrintOrchestratorOptions) {
    this.printerManager = options.printerManager;
    this.htmlRenderer = options.htmlRenderer;
    this.processing = options.processing;
    this.printer = options.printer;
    this.stats = options.stats;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * Print every message of a batch in order. One message failing does not
   * affect the others.
   */
  async processBatch(batch: EmailMessage[]): Promise<void> {
    for (const message of batch) {
      try {
        await this.processMessage(message);
      } catch (error: unknown) {
        logger.error('Failed to process message', {
          subject: message.subject,
          error: errorMessage(error),
        });
        this.stats.recordPrintFailure();
      } finally {
        this.stats.recordProcessed();
      }
    }
  }

  /**
   * Returns whether anything from the message was printed.
   */
  async processMessage(message: EmailMessage): Promise<boolean> {
    logger.info('Processing message', { subject: message.subject, from: message.sender });

    let printed = false;
    if (message.attachments.length > 0 && this.processing.print_attachments) {
      printed = await this.printAttachments(message);
    } else if (this.hasPrintableBody(message)) {
      printed = await this.printBody(message);
    } else {
      logger.info('Nothing to print for message', { subject: message.subject });
      return false;
    }

    if (printed) {
      this.stats.recordPrinted();
    }
    return printed;
  }

  private hasPrintableBody(message: EmailMessage): boolean {
    return (
      (Boolean(message.textBody) && this.processing.print_text_emails) ||
      (Boolean(message.htmlBody) && this.processing.print_html_emails)
    );
  }

  private async printAttachments(message: EmailMessage): Promise<boolean> {
    return withTempDirectory(TEMP_DIR_PREFIX, async (dir) => {
      const usedNames = new Set<string>();
      const submissions: PrintSubmission[] = [];

      for (const attachment of message.attachments) {
        const fileName = generateUniqueFileName(toSafeFileName(attachment.filename), usedNames);
        usedNames.add(fileName);

        try {
          const submission = await this.printAttachment(dir, fileName, attachment);
          submissions.push(submission);
        } catch (error: unknown) {
          this.recordPrintError('attachment', attachment.filename, error);
        }
      }

      await this.awaitSpooling(submissions);
      logger.info(`Printed ${submissions.length} of ${message.attachments.length} attachment(s)`, {
        subject: message.subject,
      });
      return submissions.length > 0;
    });
  }

  private async printAttachment(
    dir: string,
    fileName: string,
    attachment: EmailAttachment
  ): Promise<PrintSubmission> {
    const filePath = path.join(dir, fileName);
    await fs.writeFile(filePath, attachment.data);
    return this.printerManager.printFile(
      filePath,
      attachmentTitle(attachment),
      attachment.contentType
    );
  }

  /**
   * Rejected documents count apart from print failures.
   */
  private recordPrintError(what: string, name: string, error: unknown): void {
    if (isPrintRejection(error)) {
      logger.info(`Skipping ${what}`, { name, reason: error.message });
      this.stats.recordRejected();
      return;
    }
    logger.error(`Failed to print ${what}`, { name, error: errorMessage(error) });
    this.stats.recordPrintFailure();
  }

  /**
   * Keep temporary files until the spooler has them: tracked jobs are
   * followed by id, the rest get a fixed wait sized by their count.
   */
  private async awaitSpooling(submissions: PrintSubmission[]): Promise<void> {
    let untracked = 0;
    for (const submission of submissions) {
      if (submission.tracked) {
        const outcome = await this.printerManager.waitForJob(submission);
        logger.debug('Print job wait finished', { jobId: submission.job.jobId, outcome });
      } else {
        untracked++;
      }
    }

    const waitSeconds = computeAttachmentWaitSeconds(untracked, this.processing.attachment_wait);
    if (waitSeconds > 0) {
      logger.debug(`Waiting ${waitSeconds}s for ${untracked} attachment(s) to spool`);
      await this.sleep(waitSeconds * 1000);
    }
  }

  private async printBody(message: EmailMessage): Promise<boolean> {
    const header = buildMessageHeader(message);
    const title = messageTitle(message);
    const canPrintText = Boolean(message.textBody) && this.processing.print_text_emails;

    return withTempDirectory(TEMP_DIR_PREFIX, async (dir) => {
      if (message.htmlBody && this.processing.print_html_emails) {
        try {
          const submission = await this.printHtml(dir, header, message.htmlBody, title);
          await this.awaitTracked(submission);
          return true;
        } catch (error: unknown) {
          if (!canPrintText) {
            this.recordPrintError('HTML body', message.subject, error);
            return false;
          }
          logger.warn('HTML printing failed, falling back to plain text', {
            subject: message.subject,
            error: errorMessage(error),
          });
        }
      }

      try {
        const submission = await this.printText(dir, header, message.textBody, title);
        await this.awaitTracked(submission);
        return true;
      } catch (error: unknown) {
        this.recordPrintError('text body', message.subject, error);
        return false;
      }
    });
  }

  private async printHtml(
    dir: string,
    header: string,
    html: string,
    title: string
  ): Promise<PrintSubmission> {
    const htmlPath = path.join(dir, 'email.html');
    await fs.writeFile(htmlPath, buildHtmlDocument(header, html), 'utf-8');

    if (!this.processing.convert_html_to_pdf) {
      return this.printerManager.printFile(htmlPath, title, 'text/html');
    }

    const pdfPath = path.join(dir, 'email.pdf');
    await this.htmlRenderer.render(htmlPath, pdfPath, {
      pageSize: this.printer.paper_size,
      orientation: this.printer.orientation,
    });
    return this.printerManager.printFile(pdfPath, title, 'application/pdf');
  }

  private async printText(
    dir: string,
    header: string,
    text: string,
    title: string
  ): Promise<PrintSubmission> {
    const textPath = path.join(dir, 'email.txt');
    await fs.writeFile(textPath, `${header}${text}`, 'utf-8');
    return this.printerManager.printFile(textPath, title, 'text/plain');
  }

  private async awaitTracked(submission: PrintSubmission): Promise<void> {
    if (submission.tracked) {
      await this.printerManager.waitForJob(submission);
    }
  }
}
