/**
 * Logging Middleware
 *
 * Binds a correlation id and a request-scoped logger to every request. The
 * closing log line says who called (key, auth method, token) and which
 * provider served the request, and flags clients that hung up early.
 */

import type { Request, Response, NextFunction } from 'express';
import { createLogger, Logger, generateCorrelationId } from '../services/logger.js';

declare global {
  namespace Express {
    interface Request {
      logger?: Logger;
      correlationId?: string;
      /** Provider that served a completion, set once routing succeeds */
      provider?: string;
    }
  }
}

export const CORRELATION_ID_HEADER = 'X-Correlation-ID';

const CORRELATION_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Reuses the caller's correlation id when it is a plain token, otherwise mints one
 */
export function resolveCorrelationId(header: string | undefined): string {
  const candidate = header?.trim();
  return candidate && CORRELATION_ID_PATTERN.test(candidate) ? candidate : generateCorrelationId();
}

/**
 * Caller and routing fields for the closing log line; absent values are left out
 */
export function describeCaller(req: Request): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  if (req.auth) {
    fields.apiKeyId = req.auth.apiKey.id;
    fields.authMethod = req.auth.method;
    if (req.auth.tokenId) {
      fields.tokenId = req.auth.tokenId;
    }
  }
  if (req.provider) {
    fields.provider = req.provider;
  }
  return fields;
}

export function loggingMiddleware(req: Request, res: Response, next: NextFunction): void {
  const startedAt = process.hrtime.bigint();
  const correlationId = resolveCorrelationId(req.get(CORRELATION_ID_HEADER));
  // req.path is rewritten inside mounted routers
  const path = req.path;

  const logger = createLogger(correlationId, {
    method: req.method,
    path,
    userAgent: req.get('user-agent'),
    ip: req.ip || req.socket.remoteAddress,
  });

  req.logger = logger;
  req.correlationId = correlationId;
  res.setHeader(CORRELATION_ID_HEADER, correlationId);

  logger.logRequestStart(req.method, path);

  const elapsedMs = (): number => Math.round(Number(process.hrtime.bigint() - startedAt) / 1e5) / 10;

  res.once('finish', () => {
    logger.logRequestEnd(req.method, path, res.statusCode, elapsedMs(), describeCaller(req));
  });
  res.once('close', () => {
    if (!res.writableFinished) {
      logger.warn('Client closed the connection before the response finished', {
        durationMs: elapsedMs(),
        ...describeCaller(req),
      });
    }
  });

  next();
}

export function getRequestLogger(req: Request): Logger {
  return req.logger || createLogger();
}
