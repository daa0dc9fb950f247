import { Router, Request, Response } from 'express';
import { ServiceControl } from '../services/MailPrintService';

/**
 * GET /health (liveness, no authentication)
 */
export function createHealthRouter(control: ServiceControl): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      running: control.getStatus().running,
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.round(process.uptime()),
      version: process.env.npm_package_version || '1.0.0',
    });
  });

  return router;
}
