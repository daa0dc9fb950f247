import rateLimit from 'express-rate-limit';

/**
 * Limits state-changing control calls (stop, restart, cancel).
 * One limiter per app so each app instance keeps its own counters.
 */
export const createControlLimiter = (limit = 30) =>
  rateLimit({
    windowMs: 60 * 1000,
    limit,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    message: {
      success: false,
      error: { kind: 'rate_limit', message: 'Too many control requests, try again later' },
    },
  });
