/**
 * Usage Tracking Service
 *
 * Meters completed requests: computes cost from the pricing table and appends
 * a usage record. Recording is best-effort; a failed write is logged and
 * never reaches the caller whose completion already succeeded.
 */

import { v4 as uuidv4 } from 'uuid';
import type { UsageStore } from '../db/repositories/usageRecords.js';
import { calculateCost, DEFAULT_PRICING, type PricingTable } from './pricing.js';
import { defaultLogger, describeError, type Logger } from './logger.js';
import { systemClock, type Clock, type UsageRecord, type UsageSummary } from '../types/api.js';
import type { TokenUsage } from '../types/chat.js';

export const COMPLETIONS_ENDPOINT = '/v1/chat/completions';

export interface UsageMeterOptions {
  store: UsageStore;
  pricing?: PricingTable;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Generates a usage record id, e.g. log_9c1d2e3f4a5b6c7d
 */
export function generateUsageRecordId(): string {
  return `log_${uuidv4().replace(/-/g, '').slice(0, 16)}`;
}

export class UsageMeter {
  private readonly store: UsageStore;
  private readonly pricing: PricingTable;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: UsageMeterOptions) {
    this.store = options.store;
    this.pricing = options.pricing ?? DEFAULT_PRICING;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'usageMeter' });
  }

  /**
   * Record one metered request. Returns the record, or null when persisting failed.
   */
  async record(
    apiKeyId: string,
    provider: string,
    model: string,
    endpoint: string,
    usage: TokenUsage
  ): Promise<UsageRecord | null> {
    const record: UsageRecord = {
      id: generateUsageRecordId(),
      apiKeyId,
      provider,
      model,
      endpoint,
      promptTokens: usage.promptTokens,
      completionTokens: usage.completionTokens,
      totalTokens: usage.totalTokens,
      cost: calculateCost(provider, model, usage.totalTokens, this.pricing),
      timestamp: this.clock(),
    };

    try {
      await this.store.append(record);
    } catch (error) {
      this.logger.error('Failed to record usage', {
        apiKeyId,
        provider,
        model,
        totalTokens: usage.totalTokens,
        error: describeError(error),
      });
      return null;
    }

    this.logger.debug('Usage recorded', {
      apiKeyId,
      provider,
      model,
      totalTokens: record.totalTokens,
      cost: record.cost,
    });
    return record;
  }

  async summarize(apiKeyId: string): Promise<UsageSummary> {
    return this.store.summarize(apiKeyId);
  }

  async listRecords(apiKeyId: string): Promise<UsageRecord[]> {
    return this.store.listByApiKey(apiKeyId);
  }
}
