/**
 * Request logging: one correlation ID per request, echoed in the response
 * and attached to a request-scoped logger the routes read back.
 */

import type { Request, Response, NextFunction } from 'express';
import { createLogger, Logger, generateCorrelationId } from '../services/logger.js';

declare global {
  namespace Express {
    interface Request {
      logger?: Logger;
    }
  }
}

export const CORRELATION_ID_HEADER = 'X-Correlation-ID';

const MAX_CORRELATION_ID_LENGTH = 128;

/**
 * Reuse a caller-supplied correlation ID when it is printable and short
 */
function resolveCorrelationId(header: string | undefined): string {
  if (header && header.length <= MAX_CORRELATION_ID_LENGTH && /^[\x21-\x7e]+$/.test(header)) {
    return header;
  }
  return generateCorrelationId();
}

/**
 * Log the start and end of every request under its correlation ID
 */
export function loggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();
  const correlationId = resolveCorrelationId(req.get(CORRELATION_ID_HEADER));

  const logger = createLogger(correlationId, { origin: req.get('origin') });

  req.logger = logger;
  res.setHeader(CORRELATION_ID_HEADER, correlationId);

  logger.logRequestStart(req.method, req.path);

  res.on('finish', () => {
    const durationMs = Date.now() - startTime;
    logger.logRequestEnd(req.method, req.path, res.statusCode, durationMs);
  });

  next();
}

/**
 * The request-scoped logger, or a fresh one outside the middleware
 */
export function getRequestLogger(req: Request): Logger {
  return req.logger || createLogger();
}
