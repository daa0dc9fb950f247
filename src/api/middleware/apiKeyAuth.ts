import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Read the key from the X-API-Key header, or the api_key query parameter
 * for clients that cannot set headers.
 */
function presentedKey(req: Request): string | undefined {
  const headerKey = req.header('x-api-key');
  if (headerKey) return headerKey;
  const queryKey = req.query.api_key;
  return typeof queryKey === 'string' ? queryKey : undefined;
}

/**
 * API key authentication middleware factory.
 * With no key configured every request is allowed.
 */
export function createApiKeyAuth(apiKey: string | null | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey) {
      return next();
    }

    const key = presentedKey(req);
    if (!key) {
      return res.status(401).json({
        success: false,
        error: { kind: 'auth', message: 'Missing API key. Include X-API-Key header.' },
      });
    }

    if (key !== apiKey) {
      return res.status(401).json({
        success: false,
        error: { kind: 'auth', message: 'Invalid API key' },
      });
    }

    return next();
  };
}
