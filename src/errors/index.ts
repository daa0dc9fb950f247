/**
 * Error Module
 * Exports all domain error types and utilities.
 */

export {
  DomainError,
  DomainErrorContext,
  ErrorCode,
  ErrorKind,
  ErrorPayload,
  MailboxError,
  MailboxOperation,
  PrintError,
  RenderError,
  ConfigurationError,
  ValidationError,
  isDomainError,
  isPrintRejection,
  wrapError,
  toErrorPayload,
  errorMessage,
} from './DomainError';
