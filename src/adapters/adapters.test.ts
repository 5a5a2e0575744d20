// Tests for the OpenAI-compatible adapter against a stubbed fetch

import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { createAdapter, OpenAICompatibleAdapter } from './index.js';
import { normalizeUsage, parseSSELine } from './base.js';
import { UpstreamFailureError } from '../services/errors.js';
import type { ProviderConfig } from '../types/providers.js';
import type { UpstreamChunk, UpstreamRequest } from '../types/chat.js';

const groqConfig: ProviderConfig = {
  name: 'groq',
  baseUrl: 'https://upstream.test/openai/v1',
  apiKey: 'test-provider-key',
  models: ['llama3-8b-8192'],
  timeoutMs: 5000,
};

const request: UpstreamRequest = {
  model: 'llama3-8b-8192',
  messages: [{ role: 'user', content: 'hi' }],
  max_tokens: 150,
  temperature: 0.7,
  stream: false,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function sseResponse(pieces: string[]): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const piece of pieces) {
        controller.enqueue(encoder.encode(piece));
      }
      controller.close();
    },
  });
  return new Response(body, { status: 200, headers: { 'Content-Type': 'text/event-stream' } });
}

interface PacedPiece {
  delayMs: number;
  text: string;
}

// Each piece arrives after its delay; an aborted request signal errors the body
function pacedSseResponse(pieces: PacedPiece[], signal: AbortSignal | null | undefined): Response {
  const encoder = new TextEncoder();
  let index = 0;
  const body = new ReadableStream<Uint8Array>({
    async pull(controller) {
      const piece = pieces[index];
      if (!piece) {
        controller.close();
        return;
      }
      await new Promise(resolve => setTimeout(resolve, piece.delayMs));
      if (signal?.aborted) {
        controller.error(signal.reason);
        return;
      }
      index += 1;
      controller.enqueue(encoder.encode(piece.text));
    },
  });
  return new Response(body, { status: 200, headers: { 'Content-Type': 'text/event-stream' } });
}

function streamEvent(content: string): string {
  const chunk = {
    id: 'c1',
    created: 1,
    model: 'llama3-8b-8192',
    choices: [{ index: 0, delta: { content }, finish_reason: null }],
  };
  return `data: ${JSON.stringify(chunk)}\n\n`;
}

function stubFetch(response: Response | Error) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => {
    if (response instanceof Error) {
      throw response;
    }
    return response;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

async function collect(stream: AsyncGenerator<UpstreamChunk>): Promise<UpstreamChunk[]> {
  const chunks: UpstreamChunk[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return chunks;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('createAdapter', () => {
  it('should bind an OpenAI-compatible adapter to the provider config', () => {
    const adapter = createAdapter(groqConfig);
    expect(adapter).toBeInstanceOf(OpenAICompatibleAdapter);
    expect(adapter.providerId).toBe('groq');
    expect(adapter.models).toEqual(['llama3-8b-8192']);
    expect(adapter.baseUrl).toBe('https://upstream.test/openai/v1');
  });
});

describe('normalizeUsage', () => {
  it('should map provider usage to canonical fields', () => {
    expect(normalizeUsage({ prompt_tokens: 3, completion_tokens: 4, total_tokens: 7 })).toEqual({
      promptTokens: 3,
      completionTokens: 4,
      totalTokens: 7,
    });
  });

  it('should derive a missing total', () => {
    fc.assert(
      fc.property(fc.nat({ max: 100000 }), fc.nat({ max: 100000 }), (prompt, completion) => {
        const usage = normalizeUsage({ prompt_tokens: prompt, completion_tokens: completion });
        return usage?.totalTokens === prompt + completion;
      }),
      { numRuns: 100 }
    );
  });

  it('should reject unusable payloads', () => {
    expect(normalizeUsage(undefined)).toBeNull();
    expect(normalizeUsage({ prompt_tokens: '3', completion_tokens: 4 })).toBeNull();
  });
});

describe('parseSSELine', () => {
  it('should extract data payloads only', () => {
    expect(parseSSELine('data: {"a":1}')).toBe('{"a":1}');
    expect(parseSSELine('data:[DONE]')).toBe('[DONE]');
    expect(parseSSELine(': keep-alive')).toBeNull();
    expect(parseSSELine('event: message')).toBeNull();
    expect(parseSSELine('')).toBeNull();
  });
});

describe('OpenAICompatibleAdapter', () => {
  it('should only send top_p when given', () => {
    const adapter = new OpenAICompatibleAdapter(groqConfig);
    expect(adapter.transformRequest(request)).not.toHaveProperty('top_p');
    expect(adapter.transformRequest({ ...request, top_p: 0.9 })).toMatchObject({ top_p: 0.9 });
  });

  it('should post a buffered completion and normalize usage', async () => {
    const fetchMock = stubFetch(
      jsonResponse({
        id: 'chatcmpl-1',
        object: 'chat.completion',
        created: 1700000000,
        model: 'llama3-8b-8192',
        choices: [{ index: 0, message: { role: 'assistant', content: 'hello' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 5, completion_tokens: 2, total_tokens: 7 },
      })
    );

    const adapter = createAdapter(groqConfig);
    const completion = await adapter.chatCompletion(request);

    expect(completion).toEqual({
      id: 'chatcmpl-1',
      created: 1700000000,
      model: 'llama3-8b-8192',
      choices: [{ index: 0, message: { role: 'assistant', content: 'hello' }, finish_reason: 'stop' }],
      usage: { promptTokens: 5, completionTokens: 2, totalTokens: 7 },
    });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://upstream.test/openai/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-provider-key' });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'llama3-8b-8192',
      messages: [{ role: 'user', content: 'hi' }],
      max_tokens: 150,
      temperature: 0.7,
      stream: false,
    });
  });

  it('should count a response without usage as zero tokens', async () => {
    stubFetch(
      jsonResponse({
        id: 'chatcmpl-2',
        created: 1,
        model: 'llama3-8b-8192',
        choices: [{ index: 0, message: { role: 'assistant', content: '' }, finish_reason: 'stop' }],
      })
    );

    const completion = await createAdapter(groqConfig).chatCompletion(request);
    expect(completion.usage).toEqual({ promptTokens: 0, completionTokens: 0, totalTokens: 0 });
  });

  it('should surface HTTP errors as upstream failures', async () => {
    stubFetch(new Response('rate limited', { status: 429 }));

    const failure = createAdapter(groqConfig).chatCompletion(request);
    await expect(failure).rejects.toBeInstanceOf(UpstreamFailureError);
    await expect(failure).rejects.toMatchObject({ message: 'HTTP 429: rate limited', provider: 'groq' });
  });

  it('should surface network errors as upstream failures', async () => {
    stubFetch(new Error('ECONNREFUSED'));

    await expect(createAdapter(groqConfig).chatCompletion(request)).rejects.toMatchObject({
      message: 'Request to groq failed: ECONNREFUSED',
      provider: 'groq',
    });
  });

  it('should report timeouts with the configured bound', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    stubFetch(timeout);

    await expect(createAdapter(groqConfig).chatCompletion(request)).rejects.toMatchObject({
      message: 'Request to groq timed out after 5000ms',
    });
  });

  it('should reject a malformed completion body', async () => {
    stubFetch(jsonResponse({ unexpected: true }));
    await expect(createAdapter(groqConfig).chatCompletion(request)).rejects.toMatchObject({
      message: 'Malformed completion response',
    });
  });

  it('should stream chunks in order across split reads and stop at [DONE]', async () => {
    const first = JSON.stringify({
      id: 'c1',
      created: 1,
      model: 'llama3-8b-8192',
      choices: [{ index: 0, delta: { role: 'assistant', content: 'Hel' }, finish_reason: null }],
    });
    const second = JSON.stringify({
      id: 'c1',
      created: 1,
      model: 'llama3-8b-8192',
      choices: [{ index: 0, delta: { content: 'lo' }, finish_reason: 'stop' }],
      x_groq: { usage: { prompt_tokens: 4, completion_tokens: 2, total_tokens: 6 } },
    });
    const payload = `data: ${first}\n\n: keep-alive\r\ndata: ${second}\n\ndata: [DONE]\n\ndata: {"ignored":true}\n\n`;
    // split mid-line to exercise buffering
    stubFetch(sseResponse([payload.slice(0, 17), payload.slice(17, 90), payload.slice(90)]));

    const chunks = await collect(createAdapter(groqConfig).chatCompletionStream({ ...request, stream: true }));

    expect(chunks).toEqual([
      {
        id: 'c1',
        created: 1,
        model: 'llama3-8b-8192',
        choices: [{ index: 0, delta: { role: 'assistant', content: 'Hel' }, finish_reason: null }],
        usage: null,
      },
      {
        id: 'c1',
        created: 1,
        model: 'llama3-8b-8192',
        choices: [{ index: 0, delta: { content: 'lo' }, finish_reason: 'stop' }],
        usage: { promptTokens: 4, completionTokens: 2, totalTokens: 6 },
      },
    ]);
  });

  it('should fail a stream on a malformed event', async () => {
    stubFetch(sseResponse(['data: {not json\n\n']));

    await expect(
      collect(createAdapter(groqConfig).chatCompletionStream({ ...request, stream: true }))
    ).rejects.toMatchObject({ message: 'Malformed stream event from groq' });
  });

  it('should keep a long stream open while chunks keep arriving', async () => {
    const pieces: PacedPiece[] = [];
    for (let i = 0; i < 8; i++) {
      pieces.push({ delayMs: 40, text: streamEvent(`t${i}`) });
    }
    pieces.push({ delayMs: 40, text: 'data: [DONE]\n\n' });
    vi.stubGlobal(
      'fetch',
      vi.fn(async (_url: string, init?: RequestInit) => pacedSseResponse(pieces, init?.signal))
    );
    const adapter = createAdapter({ ...groqConfig, timeoutMs: 150 });

    const chunks = await collect(adapter.chatCompletionStream({ ...request, stream: true }));

    expect(chunks.map(chunk => chunk.choices[0].delta.content)).toEqual([
      't0', 't1', 't2', 't3', 't4', 't5', 't6', 't7',
    ]);
  });

  it('should time out a stream that goes idle', async () => {
    const pieces: PacedPiece[] = [
      { delayMs: 10, text: streamEvent('first') },
      { delayMs: 300, text: streamEvent('late') },
    ];
    vi.stubGlobal(
      'fetch',
      vi.fn(async (_url: string, init?: RequestInit) => pacedSseResponse(pieces, init?.signal))
    );
    const adapter = createAdapter({ ...groqConfig, timeoutMs: 100 });
    const received: string[] = [];

    await expect(
      (async () => {
        for await (const chunk of adapter.chatCompletionStream({ ...request, stream: true })) {
          received.push(chunk.choices[0].delta.content ?? '');
        }
      })()
    ).rejects.toMatchObject({ message: 'Request to groq timed out after 100ms' });
    expect(received).toEqual(['first']);
  });

  it('should fail a stream on an HTTP error before any chunk', async () => {
    stubFetch(new Response('bad key', { status: 401 }));

    await expect(
      collect(createAdapter(groqConfig).chatCompletionStream({ ...request, stream: true }))
    ).rejects.toMatchObject({ message: 'HTTP 401: bad key', provider: 'groq' });
  });
});
