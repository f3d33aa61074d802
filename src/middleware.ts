/**
 * Express middleware utilities
 */
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { randomUUID } from 'crypto';
import { ZodError, type ZodTypeAny, type output } from 'zod';
import { log } from './log';

// ────────────────────────────────────────────────
// Request ID / Correlation ID Middleware
// ────────────────────────────────────────────────

export interface RequestWithId extends Request {
  requestId: string;
}

function hasRequestId(req: Request): req is RequestWithId {
  return 'requestId' in req && typeof req.requestId === 'string';
}

/**
 * Adds a unique request ID to each request for tracing.
 * Uses X-Request-ID header if provided, otherwise generates a new UUID.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const existingId = req.headers['x-request-id'];
  const requestId = typeof existingId === 'string' ? existingId : randomUUID();
  Object.assign(req, { requestId });
  res.setHeader('X-Request-ID', requestId);
  next();
}

export function getRequestId(req: Request): string {
  return hasRequestId(req) ? req.requestId : 'unknown';
}

// ────────────────────────────────────────────────
// Async Handler Wrapper
// ────────────────────────────────────────────────

/**
 * Wraps an async route handler so rejections reach the Express error handler.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

// ────────────────────────────────────────────────
// Global Error Handler
// ────────────────────────────────────────────────

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
  details?: unknown;
  /** Set by body-parser on malformed payloads. */
  type?: string;
}

export function createApiError(
  message: string,
  statusCode: number = 500,
  code?: string,
  details?: unknown,
): ApiError {
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  error.details = details;
  return error;
}

/**
 * Global error handler middleware. Must be registered last.
 */
export function globalErrorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const requestId = getRequestId(req);
  const statusCode = err.statusCode || 500;
  const errorCode = err.code || (err.type === 'entity.parse.failed' ? 'validation_error' : 'internal_error');

  log[statusCode >= 500 ? 'error' : 'warn'](
    {
      event: 'request_error',
      request_id: requestId,
      path: req.path,
      method: req.method,
      status: statusCode,
      code: errorCode,
      err,
    },
    'request error',
  );

  const isProduction = process.env.NODE_ENV === 'production';
  const message = statusCode >= 500 && isProduction ? 'An internal error occurred' : err.message;

  if (!res.headersSent) {
    res.status(statusCode).json({
      error: errorCode,
      message,
      requestId,
      ...(err.details && !isProduction ? { details: err.details } : {}),
    });
  }
}

// ────────────────────────────────────────────────
// Request Logging Middleware
// ────────────────────────────────────────────────

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const requestId = getRequestId(req);

  res.on('finish', () => {
    const fields = {
      event: 'request_completed',
      request_id: requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Date.now() - startTime,
    };
    if (res.statusCode >= 500) log.error(fields, 'request completed');
    else if (res.statusCode >= 400) log.warn(fields, 'request completed');
    else log.info(fields, 'request completed');
  });

  next();
}

// ────────────────────────────────────────────────
// Input Validation Helpers
// ────────────────────────────────────────────────

/**
 * Validates request body against a Zod schema.
 * Returns the parsed data or throws an ApiError.
 */
export function validateBody<S extends ZodTypeAny>(schema: S, body: unknown): output<S> {
  try {
    return schema.parse(body);
  } catch (err) {
    if (err instanceof ZodError) {
      throw createApiError(
        'Validation failed',
        400,
        'validation_error',
        err.issues.map((e) => ({ path: e.path.join('.'), message: e.message })),
      );
    }
    throw err;
  }
}
