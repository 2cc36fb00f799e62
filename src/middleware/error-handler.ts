/**
 * Error Handling Middleware
 * API error type, async route wrapper and the terminal error handler
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { env } from '../config/env';
import { CrawlConfigError } from '../modules/crawl/crawl.validation';

export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly details?: string[]
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Forward rejections from async route handlers to the error handler
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  _next: NextFunction
): void => {
  let statusCode = 500;
  let message = 'Internal server error';
  let details: string[] | undefined;

  if (err instanceof ApiError) {
    statusCode = err.statusCode;
    message = err.message;
    details = err.details;
  } else if (err instanceof CrawlConfigError) {
    statusCode = 400;
    message = err.message;
    details = err.details;
  } else if (err.name === 'CastError') {
    statusCode = 400;
    message = 'Invalid ID format';
  }

  if (statusCode >= 500) {
    console.error(`[ErrorHandler] ${req.method} ${req.path}:`, err);
  }

  res.status(statusCode).json({
    success: false,
    error: message,
    ...(details ? { details } : {}),
    ...(env.NODE_ENV === 'development' && statusCode >= 500 ? { stack: err.stack } : {}),
  });
};
