import { Response } from 'express';
import { config } from '../config';
import { isDomainError, toErrorPayload } from '../errors';
import logger from './logger';

/**
 * Send an error in the control API's `{ success: false, error }` shape.
 */
export function sendError(res: Response, error: unknown): void {
  const status = isDomainError(error) ? error.httpStatus : 500;
  if (status >= 500) {
    logger.error('Control API request failed', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  res.status(status).json({
    success: false,
    error: toErrorPayload(error, config.env === 'development'),
  });
}
