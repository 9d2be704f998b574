// src/app.ts
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { AppConfig } from '@/config/app.config';
import type { PipelineRuntime } from '@/services/pipeline-deps';
import { createApiRouter } from '@/routes';
import { errorMiddleware, notFoundMiddleware } from '@/middleware/error.middleware';

export function createApp(runtime: Pick<PipelineRuntime, 'deps' | 'components'>, config: AppConfig): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  if (config.nodeEnv === 'development') {
    app.use(morgan('dev'));
  } else if (config.nodeEnv === 'production') {
    app.use(morgan('combined'));
  }

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
    });
  });

  app.use('/api', createApiRouter(runtime, config));

  app.use(notFoundMiddleware);
  app.use(errorMiddleware);

  return app;
}
