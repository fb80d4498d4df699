import { Application, Request, Response } from 'express';
import { RouterRuntime } from '../../core/router-runtime.js';
import { HealthMonitor } from '../../monitoring/health-monitor.js';
import { createBatchRoutes } from './batches.js';
import { createErrorRoutes } from './errors.js';
import { createHealthRoutes } from './health.js';
import { createModelRoutes } from './models.js';

export interface RouteDependencies {
  runtime: RouterRuntime;
  healthMonitor: HealthMonitor;
}

/**
 * Setup all API routes for the Inference Router service
 * @param app - Express application instance
 * @param urlPrefix - URL prefix for all routes
 */
export function setupRoutes(app: Application, urlPrefix: string, deps: RouteDependencies): void {
  console.log('Setting up Inference Router API routes...');

  app.use(`${urlPrefix}/health`, createHealthRoutes(deps.healthMonitor));
  app.use(`${urlPrefix}/batches`, createBatchRoutes(deps.runtime.handleBatch));
  app.use(`${urlPrefix}/models`, createModelRoutes(deps.runtime.invoker));

  // Operator endpoint, outside the public prefix
  app.use('/errors', createErrorRoutes(deps.runtime.errorHandler));

  app.get(urlPrefix, (req: Request, res: Response) => {
    res.json({
      service: 'Inference Router',
      status: 'running',
      cacheEnabled: deps.runtime.cacheClient.isEnabled(),
      endpoints: {
        health: `${urlPrefix}/health`,
        batches: `${urlPrefix}/batches`,
        models: `${urlPrefix}/models/:modelId/invocations`
      },
      timestamp: new Date().toISOString()
    });
  });

  console.log('All API routes configured successfully');
}
