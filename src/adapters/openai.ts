// OpenAI-compatible Provider Adapter
import {
  ProviderAdapter,
  isRecord,
  normalizeUsage,
  type CallOptions,
  type ProviderRequest,
} from './base.js';
import type {
  ChatChoice,
  ChatChunkChoice,
  ChatDelta,
  ChatMessage,
  ChatRole,
  UpstreamChunk,
  UpstreamCompletion,
  UpstreamRequest,
} from '../types/chat.js';

const CHAT_COMPLETIONS_PATH = '/chat/completions';

const ROLES: readonly ChatRole[] = ['system', 'user', 'assistant'];

function readString(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function readNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' ? value : fallback;
}

function readFinishReason(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function parseMessage(value: unknown): ChatMessage {
  const message = isRecord(value) ? value : {};
  const role = ROLES.find(candidate => candidate === message.role) ?? 'assistant';
  return { role, content: readString(message.content, '') };
}

function parseDelta(value: unknown): ChatDelta {
  const delta: ChatDelta = {};
  if (!isRecord(value)) {
    return delta;
  }
  if (typeof value.role === 'string') {
    delta.role = value.role;
  }
  if (typeof value.content === 'string') {
    delta.content = value.content;
  }
  return delta;
}

/**
 * OpenAI Provider Adapter
 *
 * Serves every provider that exposes the OpenAI chat completions API
 * (OpenAI itself, Groq, Gemini's OpenAI endpoint).
 */
export class OpenAICompatibleAdapter extends ProviderAdapter {
  /**
   * Transform request - OpenAI format is native, minimal transformation
   */
  transformRequest(request: UpstreamRequest): ProviderRequest {
    const body: ProviderRequest = {
      model: request.model,
      messages: request.messages,
      max_tokens: request.max_tokens,
      temperature: request.temperature,
      stream: request.stream,
    };
    if (request.top_p !== undefined) {
      body.top_p = request.top_p;
    }
    return body;
  }

  /**
   * Transform response. Usage is normalized here; a response without one counts as zero.
   */
  transformResponse(payload: unknown, model: string): UpstreamCompletion {
    if (!isRecord(payload) || !Array.isArray(payload.choices)) {
      throw this.failure('Malformed completion response');
    }

    const choices: ChatChoice[] = payload.choices.map((choice: unknown, position: number) => {
      const entry = isRecord(choice) ? choice : {};
      return {
        index: readNumber(entry.index, position),
        message: parseMessage(entry.message),
        finish_reason: readFinishReason(entry.finish_reason),
      };
    });

    return {
      id: readString(payload.id, ''),
      created: readNumber(payload.created, 0),
      model: readString(payload.model, model),
      choices,
      usage: normalizeUsage(payload.usage) ?? { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    };
  }

  /**
   * Transform one stream event. Groq reports stream usage under x_groq.
   */
  transformChunk(payload: unknown, model: string): UpstreamChunk | null {
    if (!isRecord(payload)) {
      return null;
    }

    const rawChoices = Array.isArray(payload.choices) ? payload.choices : [];
    const choices: ChatChunkChoice[] = rawChoices.map((choice: unknown, position: number) => {
      const entry = isRecord(choice) ? choice : {};
      return {
        index: readNumber(entry.index, position),
        delta: parseDelta(entry.delta),
        finish_reason: readFinishReason(entry.finish_reason),
      };
    });

    const vendorUsage = isRecord(payload.x_groq) ? payload.x_groq.usage : undefined;
    const usage = normalizeUsage(payload.usage) ?? normalizeUsage(vendorUsage);

    if (choices.length === 0 && !usage) {
      return null;
    }

    return {
      id: readString(payload.id, ''),
      created: readNumber(payload.created, 0),
      model: readString(payload.model, model),
      choices,
      usage,
    };
  }

  /**
   * Execute chat completion
   */
  async chatCompletion(request: UpstreamRequest, options: CallOptions = {}): Promise<UpstreamCompletion> {
    const response = await this.httpPost(
      `${this.config.baseUrl}${CHAT_COMPLETIONS_PATH}`,
      this.transformRequest({ ...request, stream: false }),
      this.buildHeaders(),
      options.signal
    );

    return this.transformResponse(response.data, request.model);
  }

  /**
   * Execute streaming chat completion
   */
  async *chatCompletionStream(
    request: UpstreamRequest,
    options: CallOptions = {}
  ): AsyncGenerator<UpstreamChunk> {
    const text = this.httpPostStream(
      `${this.config.baseUrl}${CHAT_COMPLETIONS_PATH}`,
      this.transformRequest({ ...request, stream: true }),
      this.buildHeaders(),
      options.signal
    );

    for await (const data of this.readSSEData(text)) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(data);
      } catch {
        throw this.failure(`Malformed stream event from ${this.providerId}`);
      }

      const chunk = this.transformChunk(parsed, request.model);
      if (chunk) {
        yield chunk;
      }
    }
  }
}
