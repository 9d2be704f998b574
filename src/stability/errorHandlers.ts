// Process-level error handlers and graceful shutdown.
import type { Server } from 'http';
import { logger } from '@/utils/logger';
import { errorMessage } from '@/utils/helpers';

const SHUTDOWN_TIMEOUT_MS = 15_000;

let serverInstance: Server | null = null;
let cleanup: (() => Promise<void>) | null = null;
let shuttingDown = false;

/**
 * Set server instance and the cleanup to run on shutdown (drains pending writes, closes the store).
 */
export function setServerInstance(server: Server, onShutdown?: () => Promise<void>): void {
  serverInstance = server;
  cleanup = onShutdown ?? null;
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      reason: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });

    // In production, log and continue; in development, exit for faster debugging
    if (process.env.NODE_ENV !== 'production') {
      process.exit(1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  signals.forEach((signal) => {
    process.on(signal, () => {
      logger.info('process:signal', { signal });
      void gracefulShutdown(signal, 0);
    });
  });
}

function closeServer(): Promise<void> {
  return new Promise((resolve) => {
    if (!serverInstance) return resolve();
    serverInstance.close((err) => {
      if (err) logger.warn('process:server_close_failed', { error: err.message });
      else logger.info('process:server_closed');
      resolve();
    });
  });
}

export async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown', { reason });

  const forced = setTimeout(() => {
    logger.error('process:forced_shutdown', { afterMs: SHUTDOWN_TIMEOUT_MS });
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forced.unref();

  try {
    await closeServer();
    if (cleanup) await cleanup();
    logger.info('process:cleanup_done');
    process.exit(exitCode);
  } catch (error) {
    logger.error('process:shutdown_failed', { error: errorMessage(error) });
    process.exit(1);
  } finally {
    clearTimeout(forced);
  }
}
