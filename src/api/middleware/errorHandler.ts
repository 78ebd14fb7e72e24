// API layer: Global error handler middleware

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { httpLogger } from '@/utils/logger.js';

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

function normalize(err: unknown): ApiError {
  if (err instanceof ZodError) {
    return createError('Invalid request body', 400, 'VALIDATION_ERROR', err.issues);
  }
  if (err instanceof Error) {
    return err;
  }
  return createError(String(err));
}

export function errorHandler(
  raw: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const err = normalize(raw);
  const statusCode = err.statusCode ?? 500;
  const code = err.code ?? 'INTERNAL_ERROR';

  if (statusCode >= 500) {
    httpLogger.error(err.message, { code, stack: err.stack });
  } else {
    httpLogger.debug(err.message, { code, statusCode });
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
