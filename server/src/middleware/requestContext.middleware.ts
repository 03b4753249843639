/**
 * Request Context Middleware
 *
 * Every request gets a trace id (the client's x-trace-id when given, a UUID otherwise),
 * exposed as req.traceId, on a child logger as req.log and echoed in the x-trace-id header.
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger, type Logger } from '../lib/logger/structured-logger.js';

declare global {
  namespace Express {
    interface Request {
      traceId: string;
      log: Logger;
    }
  }
}

const MAX_TRACE_ID_LENGTH = 128;

function incomingTraceId(req: Request): string | undefined {
  const header = req.headers['x-trace-id'];
  const value = Array.isArray(header) ? header[0] : header;
  if (!value || value.length > MAX_TRACE_ID_LENGTH) {
    return undefined;
  }
  return value;
}

export function requestContextMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const traceId = incomingTraceId(req) ?? uuidv4();

  req.traceId = traceId;
  req.log = logger.child({ traceId });
  res.setHeader('x-trace-id', traceId);

  next();
}
