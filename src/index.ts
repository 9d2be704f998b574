// Load environment variables FIRST
import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import { loadConfig } from '@/config/app.config';
import { createApp } from '@/app';
import { createPipelineRuntime } from '@/services/pipeline-deps';
import { logger } from '@/utils/logger';
import {
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';

setupUnhandledRejectionHandler();
setupUncaughtExceptionHandler();
setupGracefulShutdown();

const config = loadConfig();
const runtime = createPipelineRuntime(config);
const app = createApp(runtime, config);

const server = app.listen(config.port, () => {
  logger.info('server:listening', {
    port: config.port,
    env: config.nodeEnv,
    model: config.inference.model,
    embedding: runtime.components.embedder.id,
    classifierMode: config.classifierMode,
  });
});

setServerInstance(server, runtime.close);
