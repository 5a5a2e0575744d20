/**
 * Usage Record Repository
 *
 * Append-only audit trail of metered requests. api_key_id is a weak reference:
 * records survive key deactivation and are never updated.
 */

import type { Queryable } from '../pool.js';
import type { ProviderUsage, UsageRecord, UsageSummary } from '../../types/api.js';

export interface UsageStore {
  append(record: UsageRecord): Promise<void>;
  /** Totals plus per-provider breakdown, scoped to one key */
  summarize(apiKeyId: string): Promise<UsageSummary>;
  /** Newest first */
  listByApiKey(apiKeyId: string): Promise<UsageRecord[]>;
}

interface UsageRecordRow {
  id: string;
  api_key_id: string;
  provider: string;
  model: string;
  endpoint: string;
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  cost: string; // NUMERIC(24, 12) comes back as string from pg
  timestamp: Date;
}

interface ProviderBreakdownRow {
  provider: string;
  requests: string;
  tokens: string;
  cost: string;
}

/**
 * Builds a summary from per-provider subtotals
 */
export function buildUsageSummary(
  apiKeyId: string,
  breakdown: Record<string, ProviderUsage>
): UsageSummary {
  const totals = Object.values(breakdown).reduce(
    (acc, usage) => ({
      totalRequests: acc.totalRequests + usage.requests,
      totalTokens: acc.totalTokens + usage.tokens,
      totalCost: acc.totalCost + usage.cost,
    }),
    { totalRequests: 0, totalTokens: 0, totalCost: 0 }
  );

  return { apiKeyId, ...totals, providerBreakdown: breakdown };
}

/**
 * Aggregates records by provider, summing requests, tokens and cost
 */
export function aggregateUsageRecords(apiKeyId: string, records: UsageRecord[]): UsageSummary {
  const breakdown: Record<string, ProviderUsage> = {};

  for (const record of records) {
    if (record.apiKeyId !== apiKeyId) {
      continue;
    }
    const current = breakdown[record.provider] ?? { requests: 0, tokens: 0, cost: 0 };
    breakdown[record.provider] = {
      requests: current.requests + 1,
      tokens: current.tokens + record.totalTokens,
      cost: current.cost + record.cost,
    };
  }

  return buildUsageSummary(apiKeyId, breakdown);
}

export function mapRowToUsageRecord(row: UsageRecordRow): UsageRecord {
  return {
    id: row.id,
    apiKeyId: row.api_key_id,
    provider: row.provider,
    model: row.model,
    endpoint: row.endpoint,
    promptTokens: row.prompt_tokens,
    completionTokens: row.completion_tokens,
    totalTokens: row.total_tokens,
    cost: parseFloat(row.cost),
    timestamp: row.timestamp,
  };
}

export class PgUsageStore implements UsageStore {
  constructor(private readonly db: Queryable) {}

  async append(record: UsageRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO usage_records (
        id, api_key_id, provider, model, endpoint,
        prompt_tokens, completion_tokens, total_tokens, cost, timestamp
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [
        record.id,
        record.apiKeyId,
        record.provider,
        record.model,
        record.endpoint,
        record.promptTokens,
        record.completionTokens,
        record.totalTokens,
        record.cost,
        record.timestamp,
      ]
    );
  }

  async summarize(apiKeyId: string): Promise<UsageSummary> {
    const result = await this.db.query<ProviderBreakdownRow>(
      `SELECT
        provider,
        COUNT(*) as requests,
        COALESCE(SUM(total_tokens), 0) as tokens,
        COALESCE(SUM(cost), 0) as cost
      FROM usage_records
      WHERE api_key_id = $1
      GROUP BY provider
      ORDER BY provider`,
      [apiKeyId]
    );

    const breakdown: Record<string, ProviderUsage> = {};
    for (const row of result.rows) {
      breakdown[row.provider] = {
        requests: parseInt(row.requests, 10),
        tokens: parseInt(row.tokens, 10),
        cost: parseFloat(row.cost),
      };
    }

    return buildUsageSummary(apiKeyId, breakdown);
  }

  async listByApiKey(apiKeyId: string): Promise<UsageRecord[]> {
    const result = await this.db.query<UsageRecordRow>(
      'SELECT * FROM usage_records WHERE api_key_id = $1 ORDER BY timestamp DESC',
      [apiKeyId]
    );
    return result.rows.map(mapRowToUsageRecord);
  }
}

export class InMemoryUsageStore implements UsageStore {
  private readonly records: UsageRecord[] = [];

  async append(record: UsageRecord): Promise<void> {
    this.records.push({ ...record });
  }

  async summarize(apiKeyId: string): Promise<UsageSummary> {
    return aggregateUsageRecords(apiKeyId, this.records);
  }

  async listByApiKey(apiKeyId: string): Promise<UsageRecord[]> {
    return this.records
      .filter(record => record.apiKeyId === apiKeyId)
      .map(record => ({ ...record }))
      .reverse();
  }
}
