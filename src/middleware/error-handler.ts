/**
 * Error Handling Middleware
 */

import { NextFunction, Request, Response } from 'express';
import { env } from '../config/env';

export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Forward rejections from async route handlers to the error handler
 */
export const asyncHandler =
  (fn: AsyncRoute): AsyncRoute =>
  (req, res, next) =>
    fn(req, res, next).catch(next);

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction): void => {
  const statusCode = err instanceof ApiError ? err.statusCode : 500;

  if (statusCode >= 500) {
    console.error(`❌ ${req.method} ${req.path}:`, err);
  }

  res.status(statusCode).json({
    success: false,
    error: err.message || 'Internal server error',
    ...(env.NODE_ENV === 'development' && { stack: err.stack }),
  });
};
