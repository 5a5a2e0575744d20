import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createTestApp, type TestServices } from '../testing/harness.js';
import { completionFor } from '../testing/scriptedAdapter.js';

describe('usage routes', () => {
  let app: Express;
  let services: TestServices;
  let auth: string;
  let keyId: string;

  beforeEach(async () => {
    ({ app, services } = createTestApp());
    const created = await services.keys.create('ci');
    auth = `Bearer ${created.key}`;
    keyId = created.apiKey.id;
  });

  async function complete(model: string): Promise<void> {
    const res = await request(app)
      .post('/v1/chat/completions')
      .set('Authorization', auth)
      .send({ model, messages: [{ role: 'user', content: 'Hi' }] });
    expect(res.status).toBe(200);
  }

  it('starts empty', async () => {
    const res = await request(app).get('/v1/usage').set('Authorization', auth);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      api_key_id: keyId,
      total_requests: 0,
      total_tokens: 0,
      total_cost: 0,
      provider_breakdown: {},
    });
  });

  it('aggregates completions per provider', async () => {
    services.groq.completion = completionFor('llama3-8b-8192', 'hi', {
      promptTokens: 400,
      completionTokens: 600,
      totalTokens: 1000,
    });

    await complete('gpt-4');
    await complete('gpt-4');
    await complete('llama3-8b-8192');

    const res = await request(app).get('/v1/usage').set('Authorization', auth);

    expect(res.body.total_requests).toBe(3);
    expect(res.body.total_tokens).toBe(1060);
    expect(res.body.provider_breakdown.openai.requests).toBe(2);
    expect(res.body.provider_breakdown.openai.tokens).toBe(60);
    expect(res.body.provider_breakdown.openai.cost).toBeCloseTo(0.0018, 10);
    expect(res.body.provider_breakdown.groq).toMatchObject({ requests: 1, tokens: 1000 });
    expect(res.body.provider_breakdown.groq.cost).toBeCloseTo(0.0001, 10);
    expect(res.body.total_cost).toBeCloseTo(0.0019, 10);
  });

  it('never shows another key\'s usage', async () => {
    await complete('gpt-4');
    const other = await services.keys.create('other');

    const res = await request(app).get('/v1/usage').set('Authorization', `Bearer ${other.key}`);

    expect(res.body.total_requests).toBe(0);
  });

  it('summarizes the key counters', async () => {
    await complete('gpt-4');

    const res = await request(app).get('/v1/usage/summary').set('Authorization', auth);

    expect(res.body).toEqual({
      api_key_id: keyId,
      message: 'Usage tracking is active',
      rate_limit: 1000,
      current_usage: 2,
    });
  });

  it('lists individual records', async () => {
    await complete('gpt-4');

    const res = await request(app).get('/v1/usage/records').set('Authorization', auth);

    expect(res.body.object).toBe('list');
    expect(res.body.data).toHaveLength(1);
    expect(res.body.data[0]).toMatchObject({
      provider: 'openai',
      model: 'gpt-4',
      endpoint: '/v1/chat/completions',
      prompt_tokens: 10,
      completion_tokens: 20,
      total_tokens: 30,
      timestamp: '2025-01-15T12:00:00.000Z',
    });
    expect(res.body.data[0].id).toMatch(/^log_[0-9a-f]{16}$/);
  });
});
