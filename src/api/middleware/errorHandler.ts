// API layer: Global error handler middleware

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AuthError, type AuthErrorKind } from '@/domain/user/errors.js';
import { authLogger } from '@/utils/auth-logger.js';

const RETRY_AFTER_SECONDS = 5;

const STATUS_BY_KIND: Record<AuthErrorKind, number> = {
  validation: 400,
  conflict: 409,
  credentials: 401,
  session: 401,
  not_found: 404,
  unavailable: 503,
};

interface ClientRequestError {
  status: number;
  type?: string;
}

function isClientRequestError(err: unknown): err is ClientRequestError {
  if (typeof err !== 'object' || err === null || !('status' in err)) {
    return false;
  }
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500;
}

export function statusForAuthError(error: AuthError): number {
  if (error.code === 'ACCOUNT_LOCKED') {
    return 429;
  }
  return STATUS_BY_KIND[error.kind];
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof AuthError) {
    const statusCode = statusForAuthError(err);
    if (err.retryable) {
      res.setHeader('Retry-After', String(RETRY_AFTER_SECONDS));
    }

    res.status(statusCode).json({
      success: false,
      error: {
        code: err.code,
        message: err.message,
        ...(err.details ? { details: err.details } : {}),
      },
    });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      success: false,
      error: {
        code: 'INVALID_INPUT',
        message: 'Request is not valid',
        details: { fields: err.issues.map((issue) => issue.path.join('.')) },
      },
    });
    return;
  }

  // Body parser failures (malformed JSON, oversized or undecodable bodies) carry a 4xx status
  if (isClientRequestError(err)) {
    const tooLarge = err.type === 'entity.too.large';
    res.status(err.status).json({
      success: false,
      error: tooLarge
        ? { code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large' }
        : { code: 'INVALID_INPUT', message: 'Request is not valid' },
    });
    return;
  }

  authLogger.error('Unhandled request error', {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error && process.env.NODE_ENV !== 'production' ? err.stack : undefined,
  });

  res.status(500).json({
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
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
