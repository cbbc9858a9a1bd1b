/**
 * Task API routes.
 *
 * POST /submit         Build or revise a static app
 * POST /api/v1/tasks   Same handler under the versioned prefix
 *
 * The response body is the same structure that is sent to the caller's
 * callback URL, minus the request identity fields.
 */

import { NextFunction, Request, Response, Router } from 'express';
import { validationError } from '../domain/errors';
import { toBoundaryResponse } from '../domain/pipeline';
import { PipelineController } from '../engine/pipeline-controller';
import { ApiError, httpStatusForCode } from './middleware';
import { TaskRequestSchema, toTaskRequest } from './schemas';

export function createTaskHandler(controller: PipelineController) {
  return async (req: Request, res: Response, next: NextFunction) => {
    const parsed = TaskRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      next(new ApiError(validationError(`Invalid request: ${issues.join('; ')}`, { issues })));
      return;
    }

    try {
      const result = await controller.run(toTaskRequest(parsed.data));
      const status = result.outcome === 'success' ? 200 : httpStatusForCode(result.error.code);
      res.status(status).json(toBoundaryResponse(result));
    } catch (err) {
      next(err);
    }
  };
}

export function createTaskRoutes(controller: PipelineController): Router {
  const router = Router();
  const handler = createTaskHandler(controller);

  router.post('/submit', handler);
  router.post('/api/v1/tasks', handler);

  return router;
}
