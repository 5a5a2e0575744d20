// Base Provider Adapter abstract class
import type { ProviderConfig } from '../types/providers.js';
import type { TokenUsage, UpstreamChunk, UpstreamCompletion, UpstreamRequest } from '../types/chat.js';
import { UpstreamFailureError } from '../services/errors.js';

/**
 * Provider-specific request format (varies by provider)
 */
export interface ProviderRequest {
  [key: string]: unknown;
}

/**
 * HTTP response wrapper for provider calls
 */
export interface HttpResponse<T> {
  status: number;
  data: T;
}

export interface CallOptions {
  /** Aborted when the caller goes away */
  signal?: AbortSignal;
}

const SSE_DONE = '[DONE]';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalize a provider usage payload ({prompt_tokens, completion_tokens, total_tokens})
 * to TokenUsage. A missing total is derived; anything unusable yields null.
 */
export function normalizeUsage(raw: unknown): TokenUsage | null {
  if (!isRecord(raw)) {
    return null;
  }
  const prompt = raw.prompt_tokens;
  const completion = raw.completion_tokens;
  if (typeof prompt !== 'number' || typeof completion !== 'number') {
    return null;
  }
  const total = typeof raw.total_tokens === 'number' ? raw.total_tokens : prompt + completion;
  return { promptTokens: prompt, completionTokens: completion, totalTokens: total };
}

/**
 * Payload of one SSE line, or null for blank lines, comments and other fields
 */
export function parseSSELine(line: string): string | null {
  if (!line.startsWith('data:')) {
    return null;
  }
  const data = line.slice(5).trim();
  return data.length > 0 ? data : null;
}

/**
 * Aborts its signal with a TimeoutError once `ms` pass without a reset
 */
export class IdleTimeout {
  private readonly controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | undefined;

  constructor(private readonly ms: number) {
    this.reset();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  reset(): void {
    this.clear();
    this.timer = setTimeout(() => {
      const reason = new Error(`No response within ${this.ms}ms`);
      reason.name = 'TimeoutError';
      this.controller.abort(reason);
    }, this.ms);
  }

  clear(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}

/**
 * Abstract base class for provider adapters
 */
export abstract class ProviderAdapter {
  readonly providerId: string;
  protected readonly config: ProviderConfig;

  constructor(config: ProviderConfig) {
    this.providerId = config.name;
    this.config = config;
  }

  get models(): readonly string[] {
    return this.config.models;
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  /**
   * Transform the gateway request to the provider's format
   */
  abstract transformRequest(request: UpstreamRequest): ProviderRequest;

  /**
   * Transform a provider response body to the canonical completion
   */
  abstract transformResponse(payload: unknown, model: string): UpstreamCompletion;

  /**
   * Transform one streamed event; null for events that carry nothing to forward
   */
  abstract transformChunk(payload: unknown, model: string): UpstreamChunk | null;

  /**
   * Execute chat completion (buffered)
   */
  abstract chatCompletion(request: UpstreamRequest, options?: CallOptions): Promise<UpstreamCompletion>;

  /**
   * Execute streaming chat completion
   */
  abstract chatCompletionStream(
    request: UpstreamRequest,
    options?: CallOptions
  ): AsyncGenerator<UpstreamChunk>;

  /**
   * Build headers for API requests
   */
  protected buildHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.config.apiKey}`,
    };
  }

  /**
   * Caller cancellation combined with the upstream idle timeout
   */
  protected requestSignal(idle: IdleTimeout, signal?: AbortSignal): AbortSignal {
    return signal ? AbortSignal.any([signal, idle.signal]) : idle.signal;
  }

  protected failure(message: string): UpstreamFailureError {
    return new UpstreamFailureError(message, this.providerId);
  }

  private async send(
    url: string,
    body: unknown,
    headers: Record<string, string>,
    idle: IdleTimeout,
    signal?: AbortSignal
  ): Promise<Response> {
    try {
      return await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: this.requestSignal(idle, signal),
      });
    } catch (error) {
      throw this.toFailure(error);
    }
  }

  protected toFailure(error: unknown): UpstreamFailureError {
    if (error instanceof UpstreamFailureError) {
      return error;
    }
    if (error instanceof Error && error.name === 'TimeoutError') {
      return this.failure(`Request to ${this.providerId} timed out after ${this.config.timeoutMs}ms`);
    }
    if (error instanceof Error && error.name === 'AbortError') {
      return this.failure(`Request to ${this.providerId} was cancelled`);
    }
    const detail = error instanceof Error ? error.message : String(error);
    return this.failure(`Request to ${this.providerId} failed: ${detail}`);
  }

  /**
   * Make an HTTP POST request and parse the JSON body
   */
  protected async httpPost(
    url: string,
    body: unknown,
    headers: Record<string, string>,
    signal?: AbortSignal
  ): Promise<HttpResponse<unknown>> {
    const idle = new IdleTimeout(this.config.timeoutMs);
    try {
      const response = await this.send(url, body, headers, idle, signal);

      if (!response.ok) {
        const errorData = await response.text();
        throw this.failure(`HTTP ${response.status}: ${errorData}`);
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch (error) {
        throw this.toFailure(error);
      }
      return { status: response.status, data };
    } finally {
      idle.clear();
    }
  }

  /**
   * Make a streaming HTTP POST request, yielding decoded text as it arrives
   */
  protected async *httpPostStream(
    url: string,
    body: unknown,
    headers: Record<string, string>,
    signal?: AbortSignal
  ): AsyncGenerator<string> {
    // bounds the wait for headers and for each read, not the whole stream
    const idle = new IdleTimeout(this.config.timeoutMs);
    try {
      const response = await this.send(url, body, headers, idle, signal);

      if (!response.ok) {
        const errorData = await response.text();
        throw this.failure(`HTTP ${response.status}: ${errorData}`);
      }

      if (!response.body) {
        throw this.failure('Response body is null');
      }

      const decoder = new TextDecoder();
      try {
        idle.reset();
        // leaving the loop early cancels the body
        for await (const value of response.body) {
          idle.clear();
          yield decoder.decode(value, { stream: true });
          idle.reset();
        }
      } catch (error) {
        throw this.toFailure(error);
      }

      const tail = decoder.decode();
      if (tail) {
        yield tail;
      }
    } finally {
      idle.clear();
    }
  }

  /**
   * Split decoded SSE text into data payloads. A line split across reads is
   * held until its newline arrives; the stream ends at the [DONE] marker.
   */
  protected async *readSSEData(text: AsyncIterable<string>): AsyncGenerator<string> {
    let buffer = '';

    for await (const piece of text) {
      buffer += piece;
      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const line = buffer.slice(0, newline).replace(/\r$/, '');
        buffer = buffer.slice(newline + 1);
        const data = parseSSELine(line);
        if (data === SSE_DONE) {
          return;
        }
        if (data !== null) {
          yield data;
        }
        newline = buffer.indexOf('\n');
      }
    }

    const data = parseSSELine(buffer.trim());
    if (data !== null && data !== SSE_DONE) {
      yield data;
    }
  }
}
