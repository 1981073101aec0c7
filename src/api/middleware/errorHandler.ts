// API layer: Global error handler middleware

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { serverLogger } from '@/utils/logger.js';

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
  details?: unknown;
  /** Set by body-parser on errors raised while reading the request body */
  type?: string;
}

const BODY_ERROR_CODES: Record<string, string> = {
  'entity.parse.failed': 'INVALID_JSON',
  'entity.too.large': 'PAYLOAD_TOO_LARGE',
};

export function createError(
  message: string,
  statusCode: number = 500,
  code?: string,
  details?: unknown
): ApiError {
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  error.details = details;
  return error;
}

function fromZodError(err: ZodError): ApiError {
  return createError(
    'Invalid request body',
    400,
    'VALIDATION_ERROR',
    err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
  );
}

export function errorHandler(
  thrown: ApiError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const err = thrown instanceof ZodError ? fromZodError(thrown) : thrown;
  const statusCode = err.statusCode ?? 500;
  const bodyErrorCode = err.type ? BODY_ERROR_CODES[err.type] : undefined;
  const code = err.code ?? bodyErrorCode ?? 'INTERNAL_ERROR';

  if (statusCode >= 500) {
    serverLogger.error(`[Error ${code}] ${err.message}`, { stack: err.stack });
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
