/** Route aggregator. */
import express from 'express';
import type { AppConfig } from '@/config/app.config';
import type { PipelineRuntime } from '@/services/pipeline-deps';
import { createQueryRouter } from './query';
import { createEvaluateRouter } from './evaluate';
import { createStatusRouter } from './status';

export function createApiRouter(runtime: Pick<PipelineRuntime, 'deps' | 'components'>, config: AppConfig): express.Router {
  const router = express.Router();
  router.use('/query', createQueryRouter(runtime.deps));
  router.use('/evaluate', createEvaluateRouter(runtime.deps.evaluator));
  router.use('/status', createStatusRouter(runtime.components, config));
  return router;
}
