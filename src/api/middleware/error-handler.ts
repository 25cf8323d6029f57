import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../infrastructure/logger.js';

export const UNEXPECTED_ERROR_MESSAGE = 'An unexpected error occurred';

interface BodyParserError {
  type: string;
  status: number;
  message: string;
}

function isBodyParserError(value: unknown): value is BodyParserError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    'status' in value &&
    typeof value.status === 'number' &&
    value.status >= 400 &&
    value.status < 500
  );
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (isBodyParserError(err)) {
    logger.warn({ type: err.type, err: err.message }, 'Rejected request body');
    const message = err.type === 'entity.parse.failed' ? 'Malformed JSON body' : err.message;
    res.status(err.status).json({ message });
    return;
  }

  logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Unhandled error');
  res.status(500).json({ message: UNEXPECTED_ERROR_MESSAGE });
}
