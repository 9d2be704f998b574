import express, { type NextFunction, type Request, type Response } from 'express';
import type { PipelineComponents } from '@/services/pipeline-deps';
import type { AppConfig } from '@/config/app.config';
import { createSuccessResponse } from '@/utils/errorResponse';

export interface SystemStatus {
  status: 'operational';
  model: string;
  embedding: { provider: string; dimensions: number };
  liveDataProvider: string;
  storedRecords: number;
  pendingWrites: number;
  failedWrites: number;
  classifierMode: AppConfig['classifierMode'];
  capabilities: string[];
}

const CAPABILITIES = [
  'Current weather for a named location',
  'Answers grounded in stored documents and prior answers',
  'Heuristic answer evaluation (relevance, accuracy, helpfulness)',
];

export function createStatusRouter(components: PipelineComponents, config: AppConfig): express.Router {
  const router = express.Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const status: SystemStatus = {
        status: 'operational',
        model: components.engine.modelId,
        embedding: { provider: components.embedder.id, dimensions: components.embedder.dimensions },
        liveDataProvider: components.liveDataProvider.name,
        storedRecords: await components.store.count(),
        pendingWrites: components.background.pending,
        failedWrites: components.background.stats().failed,
        classifierMode: config.classifierMode,
        capabilities: CAPABILITIES,
      };
      return res.json(createSuccessResponse(status));
    } catch (err) {
      return next(err);
    }
  });

  return router;
}
