import type { NextFunction, Request, Response } from 'express';
import { logger } from '@/utils/logger';
import { errorMessage } from '@/utils/helpers';
import { createErrorResponse } from '@/utils/errorResponse';

function isBodyParseError(err: unknown): err is SyntaxError & { status: number } {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

export function errorMiddleware(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (isBodyParseError(err)) {
    res.status(400).json(createErrorResponse('Malformed JSON body', undefined, 'bad_request'));
    return;
  }
  logger.error('Unhandled error', { path: req.path, error: errorMessage(err) });
  res.status(500).json(createErrorResponse('Internal Server Error', undefined, 'internal_error'));
}

export function notFoundMiddleware(req: Request, res: Response) {
  res.status(404).json(createErrorResponse(`Route ${req.method} ${req.path} not found`, undefined, 'not_found'));
}
