/**
 * Tests for the Usage Meter
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as fc from 'fast-check';
import { UsageMeter, COMPLETIONS_ENDPOINT, generateUsageRecordId } from './usage.js';
import { InMemoryUsageStore, type UsageStore } from '../db/repositories/usageRecords.js';
import { Logger } from './logger.js';

const fixedNow = new Date('2025-01-15T12:00:00Z');
const clock = () => fixedNow;

describe('UsageMeter', () => {
  let store: InMemoryUsageStore;
  let meter: UsageMeter;

  beforeEach(() => {
    store = new InMemoryUsageStore();
    meter = new UsageMeter({ store, clock });
  });

  it('should generate log_ ids with 16 hex characters', () => {
    expect(generateUsageRecordId()).toMatch(/^log_[0-9a-f]{16}$/);
  });

  it('should record tokens and computed cost', async () => {
    const record = await meter.record('ak_alice', 'openai', 'gpt-3.5-turbo', COMPLETIONS_ENDPOINT, {
      promptTokens: 12,
      completionTokens: 30,
      totalTokens: 42,
    });

    expect(record).toMatchObject({
      apiKeyId: 'ak_alice',
      provider: 'openai',
      model: 'gpt-3.5-turbo',
      endpoint: '/v1/chat/completions',
      promptTokens: 12,
      completionTokens: 30,
      totalTokens: 42,
      timestamp: fixedNow,
    });
    expect(record?.cost).toBeCloseTo((42 / 1000) * 0.0015, 12);
    await expect(store.listByApiKey('ak_alice')).resolves.toHaveLength(1);
  });

  it('should summarize per provider and scope to the key', async () => {
    const usage = { promptTokens: 5, completionTokens: 5, totalTokens: 10 };
    await meter.record('ak_alice', 'openai', 'gpt-4', COMPLETIONS_ENDPOINT, usage);
    await meter.record('ak_alice', 'openai', 'gpt-4', COMPLETIONS_ENDPOINT, usage);
    await meter.record('ak_alice', 'groq', 'llama3-8b-8192', COMPLETIONS_ENDPOINT, usage);
    await meter.record('ak_bob', 'gemini', 'gemini-pro', COMPLETIONS_ENDPOINT, usage);

    const summary = await meter.summarize('ak_alice');

    expect(summary.totalRequests).toBe(3);
    expect(summary.totalTokens).toBe(30);
    expect(Object.keys(summary.providerBreakdown).sort()).toEqual(['groq', 'openai']);
    expect(summary.providerBreakdown.openai.requests).toBe(2);
    expect(summary.providerBreakdown.openai.cost).toBeCloseTo(0.0006, 12);
    expect(summary.providerBreakdown.groq.cost).toBeCloseTo(0.000001, 12);
  });

  it('should keep totals equal to the sum of the breakdown', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(
          fc.record({
            provider: fc.constantFrom('openai', 'groq', 'gemini'),
            tokens: fc.integer({ min: 0, max: 10_000 }),
          }),
          { maxLength: 20 }
        ),
        async (entries) => {
          const local = new UsageMeter({ store: new InMemoryUsageStore(), clock });
          for (const entry of entries) {
            await local.record('ak_alice', entry.provider, 'm', COMPLETIONS_ENDPOINT, {
              promptTokens: 0,
              completionTokens: entry.tokens,
              totalTokens: entry.tokens,
            });
          }
          const summary = await local.summarize('ak_alice');
          const breakdown = Object.values(summary.providerBreakdown);
          return (
            summary.totalRequests === entries.length &&
            summary.totalTokens === breakdown.reduce((sum, p) => sum + p.tokens, 0)
          );
        }
      ),
      { numRuns: 30 }
    );
  });

  it('should absorb and log a failing store', async () => {
    const errorSpy = vi.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    const failing: UsageStore = {
      append: () => Promise.reject(new Error('disk full')),
      summarize: (apiKeyId) => store.summarize(apiKeyId),
      listByApiKey: (apiKeyId) => store.listByApiKey(apiKeyId),
    };
    const degraded = new UsageMeter({ store: failing, clock });

    try {
      await expect(
        degraded.record('ak_alice', 'openai', 'gpt-4', COMPLETIONS_ENDPOINT, {
          promptTokens: 1,
          completionTokens: 1,
          totalTokens: 2,
        })
      ).resolves.toBeNull();
      expect(errorSpy).toHaveBeenCalledWith(
        'Failed to record usage',
        expect.objectContaining({ apiKeyId: 'ak_alice', error: 'disk full' })
      );
    } finally {
      errorSpy.mockRestore();
    }
  });
});
