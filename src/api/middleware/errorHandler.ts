// API layer: Global error handler middleware

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
  details?: unknown;
}

export function createError(
  message: string,
  statusCode: number = 500,
  code?: string,
  details?: unknown
): ApiError {
  return Object.assign(new Error(message), { statusCode, code, details });
}

function normalizeError(err: ApiError): ApiError {
  if (err instanceof ZodError) {
    return createError('Invalid request body', 400, 'VALIDATION_ERROR', err.issues);
  }
  return err;
}

export function errorHandler(
  raw: ApiError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const err = normalizeError(raw);
  const statusCode = err.statusCode ?? 500;
  const code = err.code ?? 'INTERNAL_ERROR';

  // Log error details (but not in test environment)
  if (process.env.NODE_ENV !== 'test') {
    console.error(`[Error ${code}] ${err.message}`);
    if (err.stack && statusCode >= 500) {
      console.error(err.stack);
    }
  }

  // Don't leak error details in production
  const isProduction = process.env.NODE_ENV === 'production';
  const message = isProduction && statusCode === 500
    ? 'Internal server error'
    : err.message;

  res.status(statusCode).json({
    success: false,
    error: {
      code,
      message,
      ...(err.details && !isProduction ? { details: err.details } : {}),
    },
  });
}

// Async handler wrapper to avoid try-catch in every route
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
