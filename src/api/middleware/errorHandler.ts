// API layer: Global error handler middleware

import type { Request, Response, NextFunction } from 'express';
import { isCampaignError } from '@/utils/errors.js';
import { createLogger } from '@/utils/logger.js';

const logger = createLogger('http');

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
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  error.details = details;
  return error;
}

function toApiError(err: unknown): ApiError {
  if (isCampaignError(err)) {
    return err;
  }
  if (err instanceof Error) {
    return err;
  }
  return createError(String(err));
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const error = toApiError(err);
  const statusCode = error.statusCode ?? 500;
  const code = error.code ?? 'INTERNAL_ERROR';

  if (statusCode >= 500) {
    logger.error(error.message, { code, stack: error.stack });
  } else {
    logger.debug(error.message, { code, statusCode });
  }

  // Don't leak error details in production
  const isProduction = process.env.NODE_ENV === 'production';
  const message = isProduction && statusCode === 500
    ? 'Internal server error'
    : error.message;

  res.status(statusCode).json({
    success: false,
    error: {
      code,
      message,
      ...(error.details && !isProduction ? { details: error.details } : {}),
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
