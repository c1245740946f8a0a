/**
 * CORS Middleware
 *
 * Only origins on the configured allow-list receive CORS headers.
 */

import cors from 'cors';
import type { RequestHandler } from 'express';
import { ConfigError } from '../services/errors.js';
import { CORRELATION_ID_HEADER } from './logging.js';

/**
 * @throws ConfigError when the allow-list is empty
 */
export function createCorsMiddleware(allowedOrigins: string[]): RequestHandler {
  if (allowedOrigins.length === 0) {
    throw new ConfigError('CORS allow-list must contain at least one origin');
  }

  return cors({
    origin: allowedOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', CORRELATION_ID_HEADER],
    exposedHeaders: [CORRELATION_ID_HEADER, 'Retry-After'],
    maxAge: 600,
  });
}
