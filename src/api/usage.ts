/**
 * Usage Routes
 *
 * Usage statistics, always scoped to the authenticated key.
 */

import { Router, type Request, type Response, type NextFunction, type IRouter, type RequestHandler } from 'express';
import { requireAuthContext } from '../middleware/auth.js';
import type { UsageMeter } from '../services/usage.js';
import type { UsageRecord, UsageSummary } from '../types/api.js';

export interface UsageRouterDependencies {
  usage: UsageMeter;
  authenticate: RequestHandler;
}

export function toUsageResponse(summary: UsageSummary) {
  return {
    api_key_id: summary.apiKeyId,
    total_requests: summary.totalRequests,
    total_tokens: summary.totalTokens,
    total_cost: summary.totalCost,
    provider_breakdown: summary.providerBreakdown,
  };
}

function toUsageRecordResponse(record: UsageRecord) {
  return {
    id: record.id,
    provider: record.provider,
    model: record.model,
    endpoint: record.endpoint,
    prompt_tokens: record.promptTokens,
    completion_tokens: record.completionTokens,
    total_tokens: record.totalTokens,
    cost: record.cost,
    timestamp: record.timestamp.toISOString(),
  };
}

export function createUsageRouter(deps: UsageRouterDependencies): IRouter {
  const router: IRouter = Router();
  const { usage, authenticate } = deps;

  router.get('/v1/usage', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const auth = requireAuthContext(req);
      res.json(toUsageResponse(await usage.summarize(auth.apiKey.id)));
    } catch (error) {
      next(error);
    }
  });

  router.get('/v1/usage/summary', authenticate, (req: Request, res: Response, next: NextFunction) => {
    try {
      const { apiKey } = requireAuthContext(req);
      res.json({
        api_key_id: apiKey.id,
        message: 'Usage tracking is active',
        rate_limit: apiKey.rateLimit,
        current_usage: apiKey.usageCount,
      });
    } catch (error) {
      next(error);
    }
  });

  // Newest first
  router.get('/v1/usage/records', authenticate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const auth = requireAuthContext(req);
      const records = await usage.listRecords(auth.apiKey.id);
      res.json({ object: 'list', data: records.map(toUsageRecordResponse) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
