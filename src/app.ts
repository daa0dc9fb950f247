import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createApiKeyAuth } from './api/middleware/apiKeyAuth';
import { createControlLimiter } from './middleware/rateLimiter';
import { requestId } from './middleware/requestId';
import { createHealthRouter } from './routes/health';
import { createPrinterRouter } from './routes/printer';
import { createServiceRouter } from './routes/service';
import { ServiceControl } from './services/MailPrintService';
import { sendError } from './utils/httpErrors';
import logger from './utils/logger';

export interface AppOptions {
  /** Required in X-API-Key (or ?api_key=) when set */
  apiKey?: string | null;
  /** Control calls allowed per minute */
  controlRateLimit?: number;
  /** Log each request through morgan */
  accessLog?: boolean;
}

/**
 * Build the control API around a running service.
 */
export function createApp(control: ServiceControl, options: AppOptions = {}): Express {
  const app = express();
  const limiter = createControlLimiter(options.controlRateLimit);

  // Security and parsing middleware
  app.use(helmet());
  app.use(requestId);
  app.use(cors());
  app.use(express.json());

  if (options.accessLog ?? true) {
    app.use(morgan('combined', {
      stream: {
        write: (message: string) => logger.info(message.trim()),
      },
    }));
  }

  // Liveness stays open for supervisors
  app.use('/', createHealthRouter(control));

  // API Routes
  app.use('/api', createApiKeyAuth(options.apiKey));
  app.use('/api', createServiceRouter(control, limiter));
  app.use('/api/printer', createPrinterRouter(control, limiter));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: { kind: 'not_found', message: 'Route not found' },
    });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error', { error: err.message, stack: err.stack });
    sendError(res, err);
  });

  return app;
}

export default createApp;
