import { Router, Request, Response, NextFunction } from 'express';
import { BatchHandler } from '../../core/router-runtime.js';

/**
 * Create batch submission routes
 * @param handleBatch - the same handler the queue consumer runs
 */
export function createBatchRoutes(handleBatch: BatchHandler): Router {
  const router = Router();

  /**
   * Submit a queue-shaped batch: `{ Records: [{ body }] }`
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const response = await handleBatch(req.body);
      res.status(response.statusCode).json(response);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
