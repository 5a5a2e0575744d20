/**
 * Error Handling Middleware
 *
 * Terminal handler: renders every error in the OpenAI error envelope with the
 * status of its kind. Unexpected faults are logged in full and reported as a
 * generic internal error.
 */

import type { Request, Response, NextFunction } from 'express';
import { GatewayError, NotFoundError, toErrorResponse, toGatewayError } from '../services/errors.js';
import { describeError } from '../services/logger.js';
import { getRequestLogger } from './logging.js';

/**
 * Client-side body-parser failures (bad JSON, oversized or badly encoded
 * bodies) as bad requests; null for anything else
 */
function toBodyParserError(error: unknown): GatewayError | null {
  if (!(error instanceof Error) || !('type' in error) || typeof error.type !== 'string') {
    return null;
  }
  const status = 'status' in error && typeof error.status === 'number' ? error.status : 500;
  if (status >= 500) {
    return null;
  }

  switch (error.type) {
    case 'entity.parse.failed':
      return new GatewayError('Request body is not valid JSON', 'bad_request', 'invalid_json');
    case 'entity.too.large':
      return new GatewayError('Request body exceeds the size limit', 'bad_request', 'request_too_large');
    default:
      return new GatewayError(error.message, 'bad_request', 'invalid_request_body');
  }
}

/**
 * 404 for unmatched routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`, 'route_not_found'));
}

export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  // express recognizes error handlers by arity
  _next: NextFunction
): void {
  const logger = getRequestLogger(req);

  let gatewayError: GatewayError;
  const bodyError = toBodyParserError(error);
  if (bodyError) {
    gatewayError = bodyError;
  } else {
    gatewayError = toGatewayError(error);
    if (!(error instanceof GatewayError)) {
      logger.error('Unhandled error', {
        error: describeError(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    }
  }

  if (res.headersSent) {
    res.end();
    return;
  }

  res.status(gatewayError.statusCode).json(toErrorResponse(gatewayError));
}
