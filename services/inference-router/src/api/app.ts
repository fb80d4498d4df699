import express, { Application, NextFunction, Request, Response } from 'express';
import { ClientInputError } from '../monitoring/errors.js';
import { RouteDependencies, setupRoutes } from './routes/index.js';

function bodyParserFailure(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('type' in error)) return null;
  switch (error.type) {
    case 'entity.parse.failed':
      return 'Invalid JSON format';
    case 'entity.too.large':
      return 'Request body too large';
    default:
      return null;
  }
}

/**
 * Build the express application: body parsing, routes, error middleware
 * and the 404 fallback, in that order.
 */
export function createApp(urlPrefix: string, deps: RouteDependencies): Application {
  const app = express();

  app.use(express.json({ limit: '10mb' }));

  setupRoutes(app, urlPrefix, deps);

  // Body-parser failures become client errors
  app.use((error: unknown, req: Request, res: Response, next: NextFunction): void => {
    const reason = bodyParserFailure(error);
    next(reason ? new ClientInputError(reason) : error);
  });

  // Error handling middleware (must be last)
  app.use(deps.runtime.errorHandler.middleware());

  app.use('*', (req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      timestamp: new Date().toISOString()
    });
  });

  return app;
}
