/**
 * Printer API Routes
 *
 * Printer state and spooler job control.
 */

import { Router, Request, Response, RequestHandler } from 'express';
import { handleValidationErrors, jobIdParam } from '../middleware/validation';
import { ServiceControl } from '../services/MailPrintService';
import { sendError } from '../utils/httpErrors';

export function createPrinterRouter(control: ServiceControl, limiter: RequestHandler): Router {
  const router = Router();

  /**
   * GET /api/printer/status
   */
  router.get('/status', async (_req: Request, res: Response) => {
    try {
      res.json({ success: true, data: await control.getPrinterStatus() });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/printer/jobs
   * Active spooler jobs plus the local submission history
   */
  router.get('/jobs', async (_req: Request, res: Response) => {
    try {
      res.json({ success: true, data: await control.listJobs() });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/printer/jobs/:id
   */
  router.get('/jobs/:id', jobIdParam(), handleValidationErrors, async (req: Request, res: Response) => {
    try {
      res.json({ success: true, data: await control.getJobStatus(Number(req.params.id)) });
    } catch (error: unknown) {
      sendError(res, error);
    }
  });

  const cancelJob = async (req: Request, res: Response) => {
    try {
      const jobId = Number(req.params.id);
      await control.cancelJob(jobId);
      res.json({ success: true, data: { jobId, message: `Job ${jobId} canceled` } });
    } catch (error: unknown) {
      sendError(res, error);
    }
  };

  /**
   * POST|DELETE /api/printer/jobs/:id/cancel
   */
  router.post('/jobs/:id/cancel', limiter, jobIdParam(), handleValidationErrors, cancelJob);
  router.delete('/jobs/:id/cancel', limiter, jobIdParam(), handleValidationErrors, cancelJob);

  return router;
}
