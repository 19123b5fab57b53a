/**
 * Error Handler Middleware
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';

export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string = 'Activity not found') {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

// Request conflicts with the current roster (duplicate signup, unknown participant)
export class ConflictError extends ApiError {
  constructor(message: string) {
    super(400, message);
    this.name = 'ConflictError';
  }
}

export class ValidationError extends ApiError {
  constructor(message: string) {
    super(422, message);
    this.name = 'ValidationError';
  }
}

export const notFoundHandler = (_req: Request, _res: Response, next: NextFunction): void => {
  next(new ApiError(404, 'Not Found'));
};

// Express and its parsers tag caller mistakes with a 4xx `status` or `statusCode`
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  if (typeof status === 'number' && Number.isInteger(status) && status >= 400 && status < 500) {
    return status;
  }
  return undefined;
}

export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  _next: NextFunction
): void => {
  if (error instanceof ApiError) {
    logger.warn(`${req.method} ${req.path} rejected with ${error.statusCode}: ${error.message}`);
    res.status(error.statusCode).json({ detail: error.message });
    return;
  }

  const status = clientErrorStatus(error);
  if (status !== undefined) {
    const message = error instanceof Error ? error.message : 'Bad Request';
    logger.warn(`${req.method} ${req.path} rejected with ${status}: ${message}`);
    res.status(status).json({ detail: message });
    return;
  }

  logger.error(`Unhandled error on ${req.method} ${req.path}:`, error);
  res.status(500).json({ detail: 'Internal server error' });
};
