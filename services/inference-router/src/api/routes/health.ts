import { Router, Request, Response } from 'express';
import { HealthMonitor } from '../../monitoring/health-monitor.js';

/**
 * Create health check routes
 * @param healthMonitor - health monitor over the router runtime
 * @returns Express router with health endpoints
 */
export function createHealthRoutes(healthMonitor: HealthMonitor): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response): void => {
    const health = healthMonitor.getHealthMetrics();
    res.json({
      service: 'Inference Router',
      ...health
    });
  });

  /**
   * Readiness: 503 until the inference backend is up
   */
  router.get('/ready', (req: Request, res: Response): void => {
    const health = healthMonitor.getHealthMetrics();

    if (health.status !== 'unhealthy') {
      res.json({
        status: 'ready',
        message: 'Service is ready to accept requests',
        timestamp: health.timestamp
      });
    } else {
      res.status(503).json({
        status: 'not_ready',
        message: 'Service is not ready to accept requests',
        issues: health.issues,
        timestamp: health.timestamp
      });
    }
  });

  router.get('/live', (req: Request, res: Response): void => {
    res.json({
      status: 'alive',
      message: 'Service is alive',
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    });
  });

  return router;
}
