// Chat completion type definitions (OpenAI-compatible)

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
  top_p?: number;
  stream: boolean;
  /** Pin the request to one provider instead of resolving by model */
  provider?: string;
}

/**
 * Request handed to an upstream provider (provider pinning already resolved)
 */
export type UpstreamRequest = Omit<ChatCompletionRequest, 'provider'>;

/**
 * Canonical token usage. Every provider payload is normalized to this shape
 * at the adapter boundary.
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ChatUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatChoice {
  index: number;
  message: ChatMessage;
  finish_reason: string | null;
}

export interface UpstreamCompletion {
  id: string;
  created: number;
  model: string;
  choices: ChatChoice[];
  usage: TokenUsage;
}

export interface ChatCompletionResponse {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  provider: string;
  choices: ChatChoice[];
  usage: ChatUsage;
}

export interface ChatDelta {
  role?: string;
  content?: string;
}

export interface ChatChunkChoice {
  index: number;
  delta: ChatDelta;
  finish_reason: string | null;
}

export interface ChatCompletionChunk {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  provider: string;
  choices: ChatChunkChoice[];
  usage?: ChatUsage;
}

/**
 * One chunk as received from upstream, with its usage figure (if any) already normalized
 */
export interface UpstreamChunk {
  id: string;
  created: number;
  model: string;
  choices: ChatChunkChoice[];
  usage: TokenUsage | null;
}

export interface ErrorResponse {
  error: {
    message: string;
    type: string;
    code: string;
    param?: string;
    provider?: string;
    available?: string[];
  };
}
