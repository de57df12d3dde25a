// =====================================================
// Health Check Routes
// =====================================================

import { Router, Request, Response } from 'express';
import { ApiResponse, HealthResponse } from '@activity-relay/shared-types';
import { config } from '../config';
import type { Runtime } from '../runtime';

export function createHealthRouter(runtime: Runtime): Router {
  const router: Router = Router();

  // GET /health
  router.get('/', (req: Request, res: Response) => {
    const scheduler = runtime.scheduler.state;

    const healthStatus: HealthResponse = {
      // A stopped loop means nothing is being pushed
      status: scheduler === 'stopped' ? 'degraded' : 'healthy',
      version: config.version,
      uptime: Math.floor((runtime.clock.now() - runtime.startedAt) / 1000),
      timestamp: new Date(runtime.clock.now()).toISOString(),
      activeDevices: runtime.registry.size,
      monitoredUsers: runtime.feedRefresher.monitoredUsers,
      scheduler,
    };

    const response: ApiResponse<HealthResponse> = {
      success: true,
      data: healthStatus,
      meta: {
        timestamp: healthStatus.timestamp,
        requestId: req.id,
      },
    };

    res.json(response);
  });

  // GET /health/ready (Kubernetes readiness check)
  router.get('/ready', (_req: Request, res: Response) => {
    const ready = runtime.scheduler.state !== 'stopped';
    res.status(ready ? 200 : 503).json({ ready });
  });

  // GET /health/live (Kubernetes liveness check)
  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({ alive: true });
  });

  return router;
}
