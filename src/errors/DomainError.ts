/**
 * Domain Error Base Class
 * Provides structured error handling with error codes, HTTP status mapping,
 * and retry capability information.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type ErrorCode =
  // Mailbox Errors
  | 'MAIL_001' // Connection failed
  | 'MAIL_002' // Search failed
  | 'MAIL_003' // Fetch failed
  | 'MAIL_004' // Flag update failed
  | 'MAIL_005' // Expunge failed
  // Print Errors
  | 'PRINT_001' // No printer available
  | 'PRINT_002' // Submission failed
  | 'PRINT_003' // Page limit exceeded
  | 'PRINT_004' // Unsupported content type
  | 'PRINT_005' // Job operation failed
  // Render Errors
  | 'RENDER_001' // HTML conversion failed
  | 'RENDER_002' // Image conversion failed
  // Configuration Errors
  | 'CONFIG_001' // Invalid configuration
  // Validation Errors
  | 'VALID_001' // Invalid request input
  // Generic Errors
  | 'UNKNOWN';

/** Coarse category reported to control API clients. */
export type ErrorKind = 'mailbox' | 'print' | 'render' | 'configuration' | 'validation' | 'internal';

// ============================================================================
// Base Domain Error
// ============================================================================

export interface DomainErrorContext {
  /** Original error that caused this error */
  cause?: Error;
  /** File path if applicable */
  filePath?: string;
  /** Additional context */
  [key: string]: unknown;
}

export interface ErrorPayload {
  kind: ErrorKind;
  code: ErrorCode;
  message: string;
}

export abstract class DomainError extends Error {
  /** Unique error code for categorization */
  abstract readonly code: ErrorCode;
  abstract readonly kind: ErrorKind;
  /** HTTP status code to return */
  abstract readonly httpStatus: number;
  /** Whether the operation can be retried */
  readonly isRetryable: boolean;
  /** Additional context about the error */
  readonly context: DomainErrorContext;
  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    message: string,
    context: DomainErrorContext = {},
    isRetryable = false
  ) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to a JSON-serializable object for logging.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      kind: this.kind,
      message: this.message,
      httpStatus: this.httpStatus,
      isRetryable: this.isRetryable,
      context: { ...this.context, cause: this.context.cause?.message },
      timestamp: this.timestamp.toISOString(),
    };
  }

  /**
   * Payload returned by the control API (no stack, no context).
   */
  toPayload(): ErrorPayload {
    return { kind: this.kind, code: this.code, message: this.message };
  }
}

// ============================================================================
// Mailbox Errors
// ============================================================================

export type MailboxOperation = 'connect' | 'search' | 'fetch' | 'flag' | 'expunge';

const MAILBOX_CODES: Record<MailboxOperation, ErrorCode> = {
  connect: 'MAIL_001',
  search: 'MAIL_002',
  fetch: 'MAIL_003',
  flag: 'MAIL_004',
  expunge: 'MAIL_005',
};

export class MailboxError extends DomainError {
  readonly code: ErrorCode;
  readonly kind = 'mailbox' as const;
  readonly httpStatus = 502; // Bad Gateway

  constructor(
    message: string,
    public readonly operation: MailboxOperation,
    context: DomainErrorContext = {}
  ) {
    // Mailbox failures are transient: the next poll cycle retries them
    super(message, { ...context, operation }, true);
    this.code = MAILBOX_CODES[operation];
  }

  static fromCause(operation: MailboxOperation, cause: unknown, details?: string): MailboxError {
    const causeError = cause instanceof Error ? cause : undefined;
    const reason = causeError?.message ?? String(cause);
    return new MailboxError(
      `Mailbox ${operation} failed${details ? ` (${details})` : ''}: ${reason}`,
      operation,
      { cause: causeError }
    );
  }
}

// ============================================================================
// Print Errors
// ============================================================================

export class PrintError extends DomainError {
  readonly code: ErrorCode;
  readonly kind = 'print' as const;
  readonly httpStatus: number;

  constructor(
    message: string,
    code: ErrorCode,
    context: DomainErrorContext = {},
    httpStatus = 502,
    isRetryable = false
  ) {
    super(message, context, isRetryable);
    this.code = code;
    this.httpStatus = httpStatus;
  }

  static noPrinter(): PrintError {
    return new PrintError('No printer available for printing', 'PRINT_001', {}, 503, true);
  }

  static submitFailed(title: string, cause?: Error): PrintError {
    return new PrintError(
      `Print submission failed for "${title}"${cause ? `: ${cause.message}` : ''}`,
      'PRINT_002',
      { cause, title },
      502,
      true
    );
  }

  static pageLimitExceeded(filePath: string, pageCount: number, maxPages: number): PrintError {
    return new PrintError(
      `Document exceeds page limit (${pageCount} > ${maxPages})`,
      'PRINT_003',
      { filePath, pageCount, maxPages },
      422
    );
  }

  static unsupportedType(contentType: string, filePath?: string): PrintError {
    return new PrintError(
      `Unsupported content type for printing: ${contentType}`,
      'PRINT_004',
      { filePath, contentType },
      415
    );
  }

  static jobOperationFailed(jobId: number, operation: string, cause?: Error): PrintError {
    return new PrintError(
      `Failed to ${operation} job ${jobId}${cause ? `: ${cause.message}` : ''}`,
      'PRINT_005',
      { cause, jobId, operation },
      400
    );
  }
}

// ============================================================================
// Render Errors
// ============================================================================

export class RenderError extends DomainError {
  readonly code: ErrorCode;
  readonly kind = 'render' as const;
  readonly httpStatus = 500;

  constructor(message: string, code: ErrorCode, context: DomainErrorContext = {}) {
    super(message, context, false);
    this.code = code;
  }

  static htmlConversionFailed(details: string, cause?: Error): RenderError {
    return new RenderError(`HTML to PDF conversion failed: ${details}`, 'RENDER_001', { cause });
  }

  static imageConversionFailed(filePath: string, cause?: Error): RenderError {
    return new RenderError(
      `Image to PDF conversion failed for ${filePath}${cause ? `: ${cause.message}` : ''}`,
      'RENDER_002',
      { cause, filePath }
    );
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigurationError extends DomainError {
  readonly code: ErrorCode = 'CONFIG_001';
  readonly kind = 'configuration' as const;
  readonly httpStatus = 500;

  constructor(message: string, public readonly issues: string[] = [], context: DomainErrorContext = {}) {
    super(message, { ...context, issues }, false);
  }

  static invalid(issues: string[]): ConfigurationError {
    return new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class ValidationError extends DomainError {
  readonly code: ErrorCode = 'VALID_001';
  readonly kind = 'validation' as const;
  readonly httpStatus = 400; // Bad Request

  constructor(message: string, public readonly field?: string, context: DomainErrorContext = {}) {
    super(message, { ...context, field }, false);
  }

  static invalidParameter(field: string, expected: string, value?: unknown): ValidationError {
    return new ValidationError(`Invalid ${field}: expected ${expected}`, field, { value });
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

class UnknownError extends DomainError {
  readonly code: ErrorCode = 'UNKNOWN';
  readonly kind = 'internal' as const;
  readonly httpStatus = 500;
}

/**
 * Check if an error is a DomainError.
 */
export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

/**
 * Page-limit and content-type rejections: the document is skipped, the
 * spooler never saw it.
 */
export function isPrintRejection(error: unknown): error is PrintError {
  return error instanceof PrintError && (error.code === 'PRINT_003' || error.code === 'PRINT_004');
}

/**
 * Wrap an unknown error in a DomainError if it isn't one already.
 */
export function wrapError(error: unknown, defaultMessage = 'An unexpected error occurred'): DomainError {
  if (isDomainError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : defaultMessage;
  const cause = error instanceof Error ? error : undefined;

  return new UnknownError(message, { cause });
}

/**
 * Build the control API error payload. Internal errors keep their text out
 * of the response unless explicitly exposed.
 */
export function toErrorPayload(error: unknown, exposeInternal = false): ErrorPayload {
  const domainError = wrapError(error);
  if (domainError.kind === 'internal' && !exposeInternal) {
    return { kind: 'internal', code: 'UNKNOWN', message: 'Internal server error' };
  }
  return domainError.toPayload();
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
