import { Router, Request, Response } from 'express';

export interface HealthInfo {
  version: string;
  catalogConfigured: boolean;
}

/**
 * GET /health
 * Liveness plus whether a course catalog backs semester lookups
 */
export function createHealthRouter(info: HealthInfo): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    res.json({
      ok: true,
      service: 'course-selection-solver',
      version: info.version,
      catalog: info.catalogConfigured ? 'configured' : 'none',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
