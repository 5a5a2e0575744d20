/**
 * Streaming Response Formatting
 *
 * Turns upstream chunks into client chunks and frames them as SSE. A stream
 * always ends with either the [DONE] marker or one in-band error event.
 */

import type {
  ChatCompletionChunk,
  ChatUsage,
  TokenUsage,
  UpstreamChunk,
} from '../types/chat.js';
import { toErrorResponse, type GatewayError } from './errors.js';

/**
 * Canonical usage back to the wire format
 */
export function toChatUsage(usage: TokenUsage): ChatUsage {
  return {
    prompt_tokens: usage.promptTokens,
    completion_tokens: usage.completionTokens,
    total_tokens: usage.totalTokens,
  };
}

/**
 * Client-facing chunk: the upstream chunk tagged with the serving provider
 */
export function toClientChunk(chunk: UpstreamChunk, provider: string): ChatCompletionChunk {
  const clientChunk: ChatCompletionChunk = {
    id: chunk.id,
    object: 'chat.completion.chunk',
    created: chunk.created,
    model: chunk.model,
    provider,
    choices: chunk.choices,
  };
  if (chunk.usage) {
    clientChunk.usage = toChatUsage(chunk.usage);
  }
  return clientChunk;
}

/**
 * Format a ChatCompletionChunk as SSE data
 */
export function formatSSEChunk(chunk: ChatCompletionChunk): string {
  return `data: ${JSON.stringify(chunk)}\n\n`;
}

/**
 * Format the SSE done signal
 */
export function formatSSEDone(): string {
  return 'data: [DONE]\n\n';
}

/**
 * In-band error event, in the same envelope as error responses
 */
export function formatSSEError(error: GatewayError): string {
  return `data: ${JSON.stringify(toErrorResponse(error))}\n\n`;
}
