import express, { type NextFunction, type Request, type Response } from 'express';
import { processQuery, type OrchestratorDeps, type ProcessErrorCode } from '@/services/orchestrator';
import { createErrorResponse, createSuccessResponse } from '@/utils/errorResponse';
import { logger } from '@/utils/logger';
import { queryRequestSchema, validateBody } from './validation';

function statusFor(code: ProcessErrorCode | null): number {
  if (code === 'not_found') return 404;
  if (code === 'internal_error') return 500;
  return 502;
}

export function createQueryRouter(deps: OrchestratorDeps): express.Router {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateBody(queryRequestSchema, req.body);
    if (!validation.success) {
      logger.warn('POST /api/query validation failed', { errors: validation.error });
      return res.status(400).json(createErrorResponse('Invalid request body', validation.error, 'bad_request'));
    }

    // A client that disconnects before synthesis cancels the remaining work.
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const result = await processQuery(validation.data.query, deps, {
        signal: controller.signal,
        evaluate: validation.data.evaluate,
      });
      if (result.errorCode === 'cancelled') return;
      if (result.error === null) return res.json(createSuccessResponse(result));

      const status = statusFor(result.errorCode);
      return res
        .status(status)
        .json({ ...createErrorResponse(result.error, undefined, result.errorCode ?? undefined), data: result });
    } catch (err) {
      return next(err);
    }
  });

  return router;
}
