/**
 * Message Parser
 * Turns raw RFC 822 bytes into an EmailMessage.
 */

import { AddressObject, Attachment, ParsedMail, simpleParser } from 'mailparser';
import { formatFileSize } from '../utils/fileHelpers';
import logger from '../utils/logger';
import { EmailAttachment, EmailMessage, MessageParserOptions } from './types';

const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*]/g;

/**
 * Replace characters that are not allowed in file names.
 */
export function sanitizeFilename(filename: string): string {
  return filename.replace(UNSAFE_FILENAME_CHARS, '_');
}

function addressText(value: AddressObject | AddressObject[] | undefined): string {
  if (!value) return '';
  const list = Array.isArray(value) ? value : [value];
  return list
    .map((entry) => entry.text)
    .filter(Boolean)
    .join(', ');
}

export class MessageParser {
  constructor(private readonly options: MessageParserOptions) {}

  async parse(raw: Buffer | string): Promise<EmailMessage> {
    const parsed = await simpleParser(raw);

    return {
      messageId: parsed.messageId ?? '',
      subject: parsed.subject ?? '',
      sender: addressText(parsed.from),
      recipient: addressText(parsed.to),
      date: this.extractRawDate(parsed),
      textBody: parsed.text ?? '',
      htmlBody: parsed.html || '',
      attachments: this.extractAttachments(parsed),
    };
  }

  /**
   * The Date header as written, without re-formatting.
   */
  private extractRawDate(parsed: ParsedMail): string {
    const header = parsed.headerLines.find((line) => line.key === 'date');
    if (!header) return '';
    const colon = header.line.indexOf(':');
    return header.line.slice(colon + 1).trim();
  }

  private extractAttachments(parsed: ParsedMail): EmailAttachment[] {
    const attachments: EmailAttachment[] = [];

    for (const part of parsed.attachments) {
      if (!this.isFileAttachment(part)) continue;

      const filename = sanitizeFilename(part.filename ?? '');
      const sizeBytes = part.content.length;

      if (sizeBytes > this.options.maxAttachmentSize) {
        logger.warn('Attachment exceeds size limit, dropped', {
          filename,
          size: formatFileSize(sizeBytes),
          limit: formatFileSize(this.options.maxAttachmentSize),
        });
        continue;
      }

      attachments.push({
        filename,
        contentType: part.contentType || 'application/octet-stream',
        sizeBytes,
        data: part.content,
      });
    }

    return attachments;
  }

  private isFileAttachment(part: Attachment): boolean {
    return part.contentDisposition === 'attachment' && Boolean(part.filename);
  }
}
