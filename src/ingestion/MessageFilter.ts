import path from 'path';
import { ServiceSettings } from '../config/serviceConfig';
import { EmailMessage } from '../parsing/types';

export type FilterVerdict =
  | { accepted: true }
  | { accepted: false; reason: string };

/**
 * Content filters applied after parsing, in order: subject keywords,
 * attachment size, attachment type.
 */
export class MessageFilter {
  private readonly keywords: string[];
  private readonly allowedExtensions: Set<string>;

  constructor(private readonly filters: ServiceSettings['filters']) {
    this.keywords = filters.subject_keywords.map((keyword) => keyword.toLowerCase());
    this.allowedExtensions = new Set(
      filters.allowed_attachments.map((ext) => ext.toLowerCase())
    );
  }

  evaluate(message: EmailMessage): FilterVerdict {
    if (!this.matchesSubject(message.subject)) {
      return { accepted: false, reason: 'subject does not match keywords' };
    }

    const oversized = message.attachments.find(
      (attachment) => attachment.sizeBytes > this.filters.max_attachment_size
    );
    if (oversized) {
      return { accepted: false, reason: `attachment too large: ${oversized.filename}` };
    }

    const disallowed = message.attachments.find(
      (attachment) => !this.isAllowedAttachment(attachment.filename)
    );
    if (disallowed) {
      return { accepted: false, reason: `attachment type not allowed: ${disallowed.filename}` };
    }

    return { accepted: true };
  }

  matchesSubject(subject: string): boolean {
    if (this.keywords.length === 0) return true;
    const lower = subject.toLowerCase();
    return this.keywords.some((keyword) => lower.includes(keyword));
  }

  isAllowedAttachment(filename: string): boolean {
    if (this.allowedExtensions.size === 0) return true;
    return this.allowedExtensions.has(path.extname(filename).toLowerCase());
  }
}
