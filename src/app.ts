import express, { Express } from 'express';
import { createRouter, type RouterContext } from './api/routes.js';
import {
  loggingMiddleware,
  createCorsMiddleware,
  createRateLimitMiddleware,
  errorHandler,
  notFoundHandler,
} from './middleware/index.js';
import type { RateLimiter } from './services/rateLimiter.js';

const MAX_BODY_SIZE = '1mb';

export interface GatewayContext extends RouterContext {
  rateLimiter: RateLimiter;
}

/**
 * Assemble the gateway application. Admission control runs before body
 * parsing and routing, so rejected requests never reach the backend.
 */
export function createApp(context: GatewayContext): Express {
  const app: Express = express();
  app.disable('x-powered-by');

  app.use(loggingMiddleware);
  app.use(createCorsMiddleware(context.config.cors.allowedOrigins));
  app.use(createRateLimitMiddleware(context.rateLimiter));
  app.use(express.json({ limit: MAX_BODY_SIZE }));

  app.use(createRouter(context));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
