/**
 * Completion Gateway
 *
 * Per-request pipeline: authenticate the caller, resolve the provider, call
 * upstream (buffered or streamed), meter the usage and shape the response.
 * Authentication and resolution fail before any upstream call is made.
 */

import type { KeyManager } from './keyManager.js';
import { extractApiKey } from './keyManager.js';
import type { TokenManager } from './tokenManager.js';
import { looksLikeToken } from './tokenManager.js';
import type { ProviderRegistry } from './providerRegistry.js';
import { COMPLETIONS_ENDPOINT, type UsageMeter } from './usage.js';
import { toChatUsage, toClientChunk } from './streaming.js';
import {
  MalformedCredentialError,
  MissingCredentialError,
  UpstreamFailureError,
  type GatewayError,
} from './errors.js';
import { defaultLogger, describeError, type Logger } from './logger.js';
import type { ProviderAdapter } from '../adapters/index.js';
import type { AuthContext } from '../types/api.js';
import type {
  ChatCompletionChunk,
  ChatCompletionRequest,
  ChatCompletionResponse,
  TokenUsage,
  UpstreamCompletion,
  UpstreamRequest,
} from '../types/chat.js';

export interface CredentialHeaders {
  authorization?: string;
  /** x-api-key: a raw API key */
  apiKey?: string;
}

export type StreamEvent =
  | { type: 'chunk'; chunk: ChatCompletionChunk }
  | { type: 'done' }
  | { type: 'error'; error: GatewayError };

export interface CompletionStream {
  provider: string;
  /** Lazy, single-pass; ends with exactly one done or error event */
  events: AsyncGenerator<StreamEvent>;
}

export interface InvokeOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

export interface GatewayDependencies {
  keys: KeyManager;
  tokens: TokenManager;
  registry: ProviderRegistry;
  usage: UsageMeter;
  logger?: Logger;
}

export function toUpstreamRequest(request: ChatCompletionRequest): UpstreamRequest {
  const upstream: UpstreamRequest = {
    model: request.model,
    messages: request.messages,
    max_tokens: request.max_tokens,
    temperature: request.temperature,
    stream: request.stream,
  };
  if (request.top_p !== undefined) {
    upstream.top_p = request.top_p;
  }
  return upstream;
}

export class CompletionGateway {
  private readonly keys: KeyManager;
  private readonly tokens: TokenManager;
  private readonly registry: ProviderRegistry;
  private readonly usage: UsageMeter;
  private readonly logger: Logger;

  constructor(deps: GatewayDependencies) {
    this.keys = deps.keys;
    this.tokens = deps.tokens;
    this.registry = deps.registry;
    this.usage = deps.usage;
    this.logger = (deps.logger ?? defaultLogger).child({ component: 'gateway' });
  }

  /**
   * Identify the caller. Authorization wins; x-api-key is only read when it is
   * absent. API keys are verified and counted; bearer tokens are verified
   * against their live subject key.
   */
  async authenticate(headers: CredentialHeaders): Promise<AuthContext> {
    const prefix = this.keys.prefix;
    const header = headers.authorization?.trim();

    if (!header) {
      const apiKeyHeader = headers.apiKey?.trim();
      if (!apiKeyHeader) {
        throw new MissingCredentialError();
      }
      const key = extractApiKey(apiKeyHeader, prefix);
      if (!key) {
        throw new MalformedCredentialError(prefix);
      }
      return { apiKey: await this.keys.authenticate(key), method: 'api_key' };
    }

    const key = extractApiKey(header, prefix);
    if (key) {
      return { apiKey: await this.keys.authenticate(key), method: 'api_key' };
    }

    const credential = header.startsWith('Bearer ') ? header.slice(7).trim() : header;
    if (looksLikeToken(credential)) {
      const verified = await this.tokens.verify(credential);
      return { apiKey: verified.apiKey, method: 'bearer_token', tokenId: verified.claims.jti };
    }

    throw new MalformedCredentialError(prefix);
  }

  /**
   * Buffered completion. Usage is metered before the response is returned.
   */
  async complete(
    auth: AuthContext,
    request: ChatCompletionRequest,
    options: InvokeOptions = {}
  ): Promise<ChatCompletionResponse> {
    const { adapter, provider } = this.registry.resolve(request.model, request.provider);
    const logger = (options.logger ?? this.logger).child({ provider, model: request.model });

    let completion: UpstreamCompletion;
    try {
      completion = await adapter.chatCompletion(toUpstreamRequest({ ...request, stream: false }), {
        signal: options.signal,
      });
    } catch (error) {
      throw this.toUpstreamFailure(error, provider, logger);
    }

    await this.usage.record(auth.apiKey.id, provider, request.model, COMPLETIONS_ENDPOINT, completion.usage);

    return {
      id: completion.id,
      object: 'chat.completion',
      created: completion.created,
      model: completion.model,
      provider,
      choices: completion.choices,
      usage: toChatUsage(completion.usage),
    };
  }

  /**
   * Streaming completion. Resolution errors throw here, synchronously; once a
   * stream is returned every failure arrives as an in-band error event.
   */
  startStream(
    auth: AuthContext,
    request: ChatCompletionRequest,
    options: InvokeOptions = {}
  ): CompletionStream {
    const { adapter, provider } = this.registry.resolve(request.model, request.provider);
    const logger = (options.logger ?? this.logger).child({ provider, model: request.model });

    return {
      provider,
      events: this.runStream(auth, adapter, provider, request, options.signal, logger),
    };
  }

  private async *runStream(
    auth: AuthContext,
    adapter: ProviderAdapter,
    provider: string,
    request: ChatCompletionRequest,
    signal: AbortSignal | undefined,
    logger: Logger
  ): AsyncGenerator<StreamEvent> {
    let usage: TokenUsage | null = null;

    try {
      const upstream = adapter.chatCompletionStream(toUpstreamRequest({ ...request, stream: true }), {
        signal,
      });
      for await (const chunk of upstream) {
        if (chunk.usage) {
          usage = chunk.usage;
        }
        yield { type: 'chunk', chunk: toClientChunk(chunk, provider) };
      }
      yield { type: 'done' };
    } catch (error) {
      yield { type: 'error', error: this.toUpstreamFailure(error, provider, logger) };
    } finally {
      // also runs when the consumer stops early
      if (usage) {
        await this.usage.record(auth.apiKey.id, provider, request.model, COMPLETIONS_ENDPOINT, usage);
      } else {
        logger.debug('Stream carried no usage; not metered');
      }
    }
  }

  private toUpstreamFailure(error: unknown, provider: string, logger: Logger): UpstreamFailureError {
    const failure =
      error instanceof UpstreamFailureError ? error : new UpstreamFailureError(describeError(error), provider);
    logger.warn('Upstream call failed', { error: failure.message });
    return failure;
  }
}
