import express, { type Request, type Response } from 'express';
import type { Evaluator } from '@/services/evaluator';
import { createErrorResponse, createSuccessResponse } from '@/utils/errorResponse';
import { evaluateBatchRequestSchema, evaluateRequestSchema, validateBody } from './validation';

export function createEvaluateRouter(evaluator: Evaluator): express.Router {
  const router = express.Router();

  router.post('/', (req: Request, res: Response) => {
    const validation = validateBody(evaluateRequestSchema, req.body);
    if (!validation.success) {
      return res.status(400).json(createErrorResponse('Invalid request body', validation.error, 'bad_request'));
    }
    const { query, response } = validation.data;
    return res.json(createSuccessResponse(evaluator.evaluate(query, response)));
  });

  router.post('/batch', (req: Request, res: Response) => {
    const validation = validateBody(evaluateBatchRequestSchema, req.body);
    if (!validation.success) {
      return res.status(400).json(createErrorResponse('Invalid request body', validation.error, 'bad_request'));
    }
    return res.json(createSuccessResponse(evaluator.evaluateBatch(validation.data.items)));
  });

  return router;
}
