/**
 * Parsed message model handed from the poller to the print orchestrator.
 */

export interface EmailAttachment {
  /** Sanitized for filesystem use */
  filename: string;
  contentType: string;
  sizeBytes: number;
  data: Buffer;
}

export interface EmailMessage {
  /** Message-ID header; empty when the message has none */
  messageId: string;
  subject: string;
  sender: string;
  recipient: string;
  /** Raw Date header, for display only */
  date: string;
  textBody: string;
  htmlBody: string;
  attachments: EmailAttachment[];
}

export interface MessageParserOptions {
  maxAttachmentSize: number;
}
