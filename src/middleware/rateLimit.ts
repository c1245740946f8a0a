/**
 * Rate Limit Middleware
 *
 * Admits or rejects every request against the shared token bucket before
 * any routing or body parsing happens.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { RateLimiter } from '../services/rateLimiter.js';
import { createErrorResponse } from '../services/errors.js';
import { getRequestLogger } from './logging.js';

export function createRateLimitMiddleware(limiter: RateLimiter): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const result = await limiter.consume();
      if (result.allowed) {
        next();
        return;
      }

      const retryAfter = result.retryAfter ?? 1;
      getRequestLogger(req).warn('Rate limit exceeded', { retryAfter });

      res.status(429)
        .set('Retry-After', String(retryAfter))
        .json(createErrorResponse(
          'Rate limit exceeded. Please retry after the specified time.',
          'rate_limit_error',
          'rate_limit_exceeded'
        ));
    } catch (error) {
      next(error);
    }
  };
}
