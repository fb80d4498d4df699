import { Router, Request, Response } from 'express';
import { ErrorHandler } from '../../monitoring/error-handler.js';

const RECENT_ERROR_LIMIT = 10;

export function createErrorRoutes(errorHandler: ErrorHandler): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response): void => {
    res.json({
      stats: errorHandler.getErrorStats(),
      recent: errorHandler.getAllErrors().slice(-RECENT_ERROR_LIMIT)
    });
  });

  return router;
}
