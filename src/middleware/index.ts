/**
 * Middleware exports
 */

export {
  createAuthMiddleware,
  requireAuthContext,
  API_KEY_HEADER,
} from './auth.js';

export {
  loggingMiddleware,
  getRequestLogger,
  CORRELATION_ID_HEADER,
} from './logging.js';

export { errorHandler, notFoundHandler } from './errorHandler.js';
