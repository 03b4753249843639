/**
 * Centralized Error Middleware
 * Clients get a code, a message and the trace id; stacks and upstream details stay in the logs
 * (stacks are included outside production).
 */

import type { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger/structured-logger.js';

function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

/**
 * Known failure with an HTTP status and a stable error code.
 * `exposeMessage` marks messages safe to show to clients.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown,
    public readonly exposeMessage: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export interface ErrorResponse {
  error: string;
  code: string;
  traceId: string;
  details?: unknown;
  stack?: string;
}

function resolveTraceId(req: Request, res: Response): string {
  if (req.traceId) {
    return req.traceId;
  }
  const header = res.getHeader('x-trace-id');
  return typeof header === 'string' ? header : 'unknown';
}

/** Registered after every router. */
export function errorMiddleware(
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    return next(err);
  }

  const appError = err instanceof AppError ? err : undefined;
  const traceId = resolveTraceId(req, res);
  const statusCode = appError ? appError.statusCode : 500;
  const code = appError ? appError.code : 'INTERNAL_ERROR';

  let clientMessage: string;
  if (appError) {
    clientMessage = appError.exposeMessage ? appError.message : getGenericMessage(statusCode);
  } else {
    clientMessage = isProduction() ? 'Internal server error' : err.message || 'Internal server error';
  }

  const log = req.log ?? logger;
  const logContext = {
    event: 'http_request_error',
    error: { name: err.name, message: err.message, stack: err.stack, code, statusCode },
    traceId,
    method: req.method,
    path: req.path,
  };
  if (statusCode >= 500) {
    log.error(logContext, '[HTTP] Request error');
  } else {
    log.warn(logContext, '[HTTP] Request error');
  }

  const response: ErrorResponse = { error: clientMessage, code, traceId };
  if (!isProduction()) {
    if (appError?.details !== undefined) {
      response.details = appError.details;
    }
    if (err.stack) {
      response.stack = err.stack;
    }
  }

  res.status(statusCode).json(response);
}

function getGenericMessage(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'Invalid request';
    case 404:
      return 'Not found';
    case 429:
      return 'Too many requests';
    case 502:
      return 'Upstream service error';
    case 503:
      return 'Service unavailable';
    case 504:
      return 'Gateway timeout';
    default:
      return statusCode >= 500 ? 'Internal server error' : 'Bad request';
  }
}

export function createValidationError(message: string, details?: unknown): AppError {
  return new AppError(message, 400, 'VALIDATION_ERROR', details, true);
}

export function createSourceNotFoundError(sourceId: string): AppError {
  return new AppError(`Unknown dictionary source: ${sourceId}`, 404, 'SOURCE_NOT_FOUND', { sourceId }, true);
}
