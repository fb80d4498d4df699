import { Router, Request, Response, NextFunction } from 'express';
import { ClientInputError } from '../../monitoring/errors.js';
import { BackendInvoker } from '../../services/backend-invoker.js';

/**
 * Create direct model invocation routes
 * @param invoker - backend invoker shared with the batch pipeline
 */
export function createModelRoutes(invoker: Pick<BackendInvoker, 'invokeModel'>): Router {
  const router = Router();

  /**
   * Run one prompt against a foundation model, bypassing routing and cache
   */
  router.post('/:modelId/invocations', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body: unknown = req.body;
      if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        throw new ClientInputError('Request body must be a JSON object');
      }

      const prompt = 'prompt' in body ? body.prompt : undefined;
      const result = await invoker.invokeModel(req.params['modelId'], prompt);
      res.status(result.statusCode).json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
