// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/errors';
import { isRecord } from '../utils/guards';
import logger from '../utils/logger';
import { logSafeError } from '../utils/safeLogger';

export interface ErrorBody {
  error: string;
  message: string;
}

export const notFoundHandler = (req: Request, res: Response): void => {
  const body: ErrorBody = { error: 'NotFound', message: `Route ${req.method} ${req.path} not found.` };
  res.status(404).json(body);
};

// body-parser marks a JSON syntax error this way.
const isMalformedBody = (err: unknown): boolean => isRecord(err) && err.type === 'entity.parse.failed';

// Express recognises error middleware by its four parameters.
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logSafeError(logger, `${req.method} ${req.originalUrl} failed`, err);
    }
    const body: ErrorBody = { error: err.kind, message: err.message };
    res.status(err.statusCode).json(body);
    return;
  }

  if (isMalformedBody(err)) {
    const body: ErrorBody = { error: 'ValidationError', message: 'Request body is not valid JSON.' };
    res.status(400).json(body);
    return;
  }

  logSafeError(logger, `Unhandled error on ${req.method} ${req.originalUrl}`, err);
  const body: ErrorBody = { error: 'InternalError', message: 'An unexpected error occurred.' };
  res.status(500).json(body);
};
