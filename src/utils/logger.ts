// src/utils/logger.ts — structured logging for the query pipeline
import { Logger, type ILogObj } from 'tslog';

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function resolveMinLevel(raw: string | undefined): number {
  if (!raw) return LEVELS.info;
  return LEVELS[raw.toLowerCase()] ?? LEVELS.info;
}

export type AppLogger = Logger<ILogObj>;

export const logger: AppLogger = new Logger<ILogObj>({
  name: 'query-pipeline',
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: process.env.NODE_ENV === 'test' ? 'hidden' : 'pretty',
});

/** Child logger scoped to a single request; carries the request id in its name. */
export function createRequestLogger(requestId: string): AppLogger {
  return logger.getSubLogger({ name: `req:${requestId}` });
}
