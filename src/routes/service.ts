/**
 * Service API Routes
 *
 * Status, statistics and lifecycle control of the polling service.
 */

import { Router, Request, Response, RequestHandler } from 'express';
import { ServiceControl } from '../services/MailPrintService';
import { sendError } from '../utils/httpErrors';
import logger from '../utils/logger';

export function createServiceRouter(control: ServiceControl, limiter: RequestHandler): Router {
  const router = Router();

  /**
   * GET /api/status
   */
  router.get('/status', (_req: Request, res: Response) => {
    try {
      res.json({ success: true, data: control.getStatus() });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/stats
   */
  router.get('/stats', (_req: Request, res: Response) => {
    try {
      res.json({ success: true, data: control.getStats() });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/service/stop
   * Waits for the current poll cycle to finish.
   */
  router.post('/service/stop', limiter, async (_req: Request, res: Response) => {
    try {
      logger.info('Stop requested through control API');
      await control.stop();
      res.json({ success: true, data: { message: 'Service stopped' } });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/service/restart
   * Restarts the poll loop in place and clears the duplicate cache.
   */
  router.post('/service/restart', limiter, async (_req: Request, res: Response) => {
    try {
      logger.info('Restart requested through control API');
      await control.restart();
      res.json({ success: true, data: { message: 'Service restarted' } });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  return router;
}
