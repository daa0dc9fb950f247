import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { runWithContext } from '../utils/requestContext';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

/**
 * Attaches a correlation/request ID to each request for logging/tracing.
 */
export function requestId(req: Request, res: Response, next: NextFunction) {
  const headerId = req.header('x-request-id');
  const id = headerId && headerId.trim().length > 0 ? headerId.trim() : randomUUID();

  // Attach to request and response for downstream use
  req.requestId = id;
  res.setHeader('x-request-id', id);
  runWithContext({ requestId: id }, next);
}
