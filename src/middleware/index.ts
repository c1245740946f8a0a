/**
 * Middleware exports
 */

export {
  loggingMiddleware,
  getRequestLogger,
  CORRELATION_ID_HEADER,
} from './logging.js';

export { createCorsMiddleware } from './cors.js';

export { createRateLimitMiddleware } from './rateLimit.js';

export { errorHandler, notFoundHandler } from './errorHandler.js';
