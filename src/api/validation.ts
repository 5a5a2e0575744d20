/**
 * Request Validation
 *
 * Checks request bodies and applies defaults. Every failure is a
 * BadRequestError naming the offending parameter.
 */

import { BadRequestError } from '../services/errors.js';
import type { TokenSettings } from '../config.js';
import type { ChatCompletionRequest, ChatMessage, ChatRole } from '../types/chat.js';

export const CHAT_DEFAULTS = {
  max_tokens: 150,
  temperature: 0.7,
  top_p: 1.0,
  stream: false,
} as const;

const ROLES: readonly ChatRole[] = ['system', 'user', 'assistant'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireBody(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new BadRequestError('Request body is required');
  }
  return body;
}

function optionalNumber(
  body: Record<string, unknown>,
  param: string,
  fallback: number,
  check: (value: number) => boolean,
  message: string
): number {
  const value = body[param];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || !check(value)) {
    throw new BadRequestError(message, 'invalid_request', param);
  }
  return value;
}

function optionalString(body: Record<string, unknown>, param: string): string | undefined {
  const value = body[param];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new BadRequestError(`${param} must be a string`, 'invalid_request', param);
  }
  return value;
}

function parseMessages(value: unknown): ChatMessage[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new BadRequestError('messages is required and must be a non-empty array', 'invalid_request', 'messages');
  }

  return value.map((entry: unknown, i: number) => {
    if (!isRecord(entry)) {
      throw new BadRequestError(`messages[${i}] must be an object`, 'invalid_request', `messages[${i}]`);
    }
    const role = ROLES.find(candidate => candidate === entry.role);
    if (!role) {
      throw new BadRequestError(
        `messages[${i}].role must be one of: ${ROLES.join(', ')}`,
        'invalid_request',
        `messages[${i}].role`
      );
    }
    if (typeof entry.content !== 'string') {
      throw new BadRequestError(
        `messages[${i}].content must be a string`,
        'invalid_request',
        `messages[${i}].content`
      );
    }
    return { role, content: entry.content };
  });
}

/**
 * Validate chat completion request
 */
export function parseChatCompletionRequest(body: unknown): ChatCompletionRequest {
  const input = requireBody(body);

  if (typeof input.model !== 'string' || input.model.length === 0) {
    throw new BadRequestError('model is required and must be a string', 'invalid_request', 'model');
  }

  const stream = input.stream ?? CHAT_DEFAULTS.stream;
  if (typeof stream !== 'boolean') {
    throw new BadRequestError('stream must be a boolean', 'invalid_request', 'stream');
  }

  const request: ChatCompletionRequest = {
    model: input.model,
    messages: parseMessages(input.messages),
    max_tokens: optionalNumber(
      input,
      'max_tokens',
      CHAT_DEFAULTS.max_tokens,
      value => Number.isInteger(value) && value >= 1,
      'max_tokens must be a positive integer'
    ),
    temperature: optionalNumber(
      input,
      'temperature',
      CHAT_DEFAULTS.temperature,
      value => value >= 0 && value <= 2,
      'temperature must be a number between 0 and 2'
    ),
    top_p: optionalNumber(
      input,
      'top_p',
      CHAT_DEFAULTS.top_p,
      value => value >= 0 && value <= 1,
      'top_p must be a number between 0 and 1'
    ),
    stream,
  };

  const provider = optionalString(input, 'provider');
  if (provider) {
    request.provider = provider;
  }

  return request;
}

export interface CreateApiKeyInput {
  name: string;
  description: string;
}

export function parseCreateApiKeyRequest(body: unknown): CreateApiKeyInput {
  const input = requireBody(body);
  if (typeof input.name !== 'string' || input.name.trim().length === 0) {
    throw new BadRequestError('name is required and must be a non-empty string', 'invalid_request', 'name');
  }
  return { name: input.name, description: optionalString(input, 'description') ?? '' };
}

export interface TokenExchangeInput {
  apiKey: string;
  expiresInHours: number;
}

/**
 * Token exchange body. Form posts deliver numbers as strings.
 */
export function parseTokenExchangeRequest(body: unknown, settings: TokenSettings): TokenExchangeInput {
  const input = requireBody(body);

  if (typeof input.api_key !== 'string' || input.api_key.length === 0) {
    throw new BadRequestError('api_key is required', 'invalid_request', 'api_key');
  }

  const raw = input.expires_in_hours;
  const hours = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw ?? settings.defaultTtlHours;
  if (
    typeof hours !== 'number' ||
    !Number.isInteger(hours) ||
    hours < settings.minTtlHours ||
    hours > settings.maxTtlHours
  ) {
    throw new BadRequestError(
      `expires_in_hours must be an integer between ${settings.minTtlHours} and ${settings.maxTtlHours}`,
      'invalid_request',
      'expires_in_hours'
    );
  }

  return { apiKey: input.api_key, expiresInHours: hours };
}

export function parseTokenBody(body: unknown): string {
  const input = requireBody(body);
  if (typeof input.token !== 'string' || input.token.length === 0) {
    throw new BadRequestError('token is required', 'invalid_request', 'token');
  }
  return input.token;
}
