/**
 * API Routes
 *
 * Service info, health and the OpenAI-compatible chat completions endpoint.
 */

import { Router, type Request, type Response, type NextFunction, type IRouter, type RequestHandler } from 'express';
import { requireAuthContext } from '../middleware/auth.js';
import { getRequestLogger } from '../middleware/logging.js';
import { parseChatCompletionRequest } from './validation.js';
import { formatSSEChunk, formatSSEDone, formatSSEError } from '../services/streaming.js';
import type { CompletionGateway, StreamEvent } from '../services/gateway.js';
import type { HealthService } from '../services/health.js';

export const SERVICE_NAME = 'LLM Router Service';
export const SERVICE_VERSION = '1.0.0';

export interface CoreRouterDependencies {
  gateway: CompletionGateway;
  health: HealthService;
  authenticate: RequestHandler;
}

function formatStreamEvent(event: StreamEvent): string {
  switch (event.type) {
    case 'chunk':
      return formatSSEChunk(event.chunk);
    case 'done':
      return formatSSEDone();
    case 'error':
      return formatSSEError(event.error);
  }
}

export function createCoreRouter(deps: CoreRouterDependencies): IRouter {
  const router: IRouter = Router();
  const { gateway, health, authenticate } = deps;

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      description: 'Unified API gateway for multiple LLM providers',
      status: 'online',
      endpoints: {
        health: '/health',
        api_keys: '/v1/api-keys',
        auth: '/auth/token',
        chat: '/v1/chat/completions',
        models: '/v1/models',
        usage: '/v1/usage',
      },
    });
  });

  // Health check endpoint
  router.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const status = await health.getHealthStatus();
      res.status(status.status === 'unhealthy' ? 503 : 200).json(status);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /v1/chat/completions
   *
   * Routes to the provider serving the model (or the pinned provider).
   * Streaming responses are SSE and always end with [DONE] or one error event.
   */
  router.post('/v1/chat/completions', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const auth = requireAuthContext(req);
      const chatRequest = parseChatCompletionRequest(req.body);
      const logger = getRequestLogger(req);

      // cancel upstream when the client goes away before we finish
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) {
          controller.abort();
        }
      });

      if (!chatRequest.stream) {
        const response = await gateway.complete(auth, chatRequest, { signal: controller.signal, logger });
        req.provider = response.provider;
        res.json(response);
        return;
      }

      // resolution errors surface here, before any SSE header is sent
      const stream = gateway.startStream(auth, chatRequest, { signal: controller.signal, logger });
      req.provider = stream.provider;

      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.setHeader('X-Accel-Buffering', 'no');
      res.flushHeaders();

      for await (const event of stream.events) {
        if (controller.signal.aborted) {
          logger.info('Client disconnected mid-stream', { provider: stream.provider });
          break;
        }
        res.write(formatStreamEvent(event));
      }
      res.end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
