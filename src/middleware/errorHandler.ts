/**
 * Error Handling Middleware
 *
 * Maps thrown errors to OpenAI-style error bodies. Internal details are
 * logged; callers only ever see the sanitized public message.
 */

import type { Request, Response, NextFunction } from 'express';
import { GatewayError, createErrorResponse } from '../services/errors.js';
import { getRequestLogger } from './logging.js';

interface ClientRequestError {
  status: number;
  type?: string;
}

/**
 * Errors raised by the body parser carry a 4xx status and a type tag
 */
function isClientRequestError(error: unknown): error is ClientRequestError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

/**
 * Respond 404 for anything no route matched
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(createErrorResponse(
    `Unknown endpoint: ${req.method} ${req.path}`,
    'invalid_request_error',
    'not_found'
  ));
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // Express recognizes error handlers by their four parameters
  _next: NextFunction
): void {
  const logger = getRequestLogger(req);

  if (res.headersSent) {
    logger.error('Error after response started', {
      error: err instanceof Error ? err.message : String(err),
    });
    res.end();
    return;
  }

  if (err instanceof GatewayError) {
    logger.error('Request failed', {
      code: err.code,
      error: err.message,
    });
    res.status(err.statusCode).json(err.toResponse());
    return;
  }

  if (isClientRequestError(err)) {
    logger.warn('Rejected malformed request body', {
      status: err.status,
      type: err.type,
    });
    const message = err.type === 'entity.parse.failed'
      ? 'Request body is not valid JSON'
      : 'Request body could not be read';
    res.status(err.status).json(createErrorResponse(message, 'invalid_request_error', 'invalid_request'));
    return;
  }

  logger.error('Unhandled error', {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(createErrorResponse('Internal server error', 'internal_error', 'internal_error'));
}
