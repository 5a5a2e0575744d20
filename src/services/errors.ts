/**
 * Gateway Error Types
 *
 * Every failure that can reach a caller is a GatewayError carrying a
 * machine-checkable kind. The HTTP layer maps kinds to status codes and
 * renders them in the OpenAI error envelope.
 */

import type { ErrorResponse } from '../types/chat.js';

export type ErrorKind =
  | 'unauthorized'
  | 'key_revoked'
  | 'forbidden'
  | 'bad_request'
  | 'not_found'
  | 'upstream_failure'
  | 'internal_error';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  unauthorized: 401,
  key_revoked: 401,
  forbidden: 403,
  bad_request: 400,
  not_found: 404,
  upstream_failure: 502,
  internal_error: 500,
};

export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly code: string
  ) {
    super(message);
    this.name = 'GatewayError';
  }

  get statusCode(): number {
    return STATUS_BY_KIND[this.kind];
  }
}

// Authentication

export class UnauthorizedError extends GatewayError {
  constructor(message = 'Authentication required', code = 'unauthorized') {
    super(message, 'unauthorized', code);
    this.name = 'UnauthorizedError';
  }
}

export class MissingCredentialError extends UnauthorizedError {
  constructor() {
    super(
      'Missing credentials. Provide "Authorization: Bearer <key-or-token>" or an "x-api-key" header.',
      'missing_credentials'
    );
    this.name = 'MissingCredentialError';
  }
}

export class MalformedCredentialError extends UnauthorizedError {
  constructor(expectedPrefix: string) {
    super(
      `Invalid authorization format. API keys start with '${expectedPrefix}'.`,
      'invalid_authorization_format'
    );
    this.name = 'MalformedCredentialError';
  }
}

/**
 * Deliberately the same for unknown and deactivated keys
 */
export class InvalidKeyError extends UnauthorizedError {
  constructor() {
    super('Invalid or expired API key', 'invalid_api_key');
    this.name = 'InvalidKeyError';
  }
}

export type TokenFailureReason = 'expired' | 'bad_signature' | 'malformed';

/**
 * Callers see one message for every reason; the reason is kept for logs and tests.
 */
export class InvalidTokenError extends UnauthorizedError {
  constructor(public readonly reason: TokenFailureReason) {
    super('Invalid or expired token', 'invalid_token');
    this.name = 'InvalidTokenError';
  }
}

export class KeyNotFoundError extends UnauthorizedError {
  constructor() {
    super('Invalid or inactive API key', 'key_not_found');
    this.name = 'KeyNotFoundError';
  }
}

export class KeyInactiveError extends UnauthorizedError {
  constructor() {
    super('Invalid or inactive API key', 'key_inactive');
    this.name = 'KeyInactiveError';
  }
}

export class KeyRevokedError extends GatewayError {
  constructor() {
    super('The API key behind this credential has been deactivated', 'key_revoked', 'key_revoked');
    this.name = 'KeyRevokedError';
  }
}

export class ForbiddenError extends GatewayError {
  constructor(message: string) {
    super(message, 'forbidden', 'forbidden');
    this.name = 'ForbiddenError';
  }
}

// Request and resolution

export class BadRequestError extends GatewayError {
  constructor(
    message: string,
    code = 'invalid_request',
    public readonly param?: string
  ) {
    super(message, 'bad_request', code);
    this.name = 'BadRequestError';
  }
}

export class UnknownModelError extends BadRequestError {
  constructor(
    public readonly model: string,
    public readonly availableModels: string[]
  ) {
    super(
      `Model '${model}' not available. Available models: ${availableModels.join(', ')}`,
      'unknown_model',
      'model'
    );
    this.name = 'UnknownModelError';
  }
}

export class UnsupportedModelForProviderError extends BadRequestError {
  constructor(
    public readonly model: string,
    public readonly provider: string,
    public readonly availableModels: string[]
  ) {
    super(
      `Model '${model}' not available for provider '${provider}'. Available: ${availableModels.join(', ')}`,
      'unsupported_model_for_provider',
      'model'
    );
    this.name = 'UnsupportedModelForProviderError';
  }
}

export class ProviderNotConfiguredError extends BadRequestError {
  constructor(
    public readonly provider: string,
    public readonly configuredProviders: string[]
  ) {
    super(
      `Provider '${provider}' not configured or available. Configured: ${configuredProviders.join(', ')}`,
      'provider_not_configured',
      'provider'
    );
    this.name = 'ProviderNotConfiguredError';
  }
}

export class NotFoundError extends GatewayError {
  constructor(
    message: string,
    code = 'not_found',
    public readonly available?: string[]
  ) {
    super(message, 'not_found', code);
    this.name = 'NotFoundError';
  }
}

// Upstream and internal

export class UpstreamFailureError extends GatewayError {
  constructor(
    message: string,
    public readonly provider: string
  ) {
    super(message, 'upstream_failure', 'upstream_failure');
    this.name = 'UpstreamFailureError';
  }
}

export class InternalError extends GatewayError {
  constructor(message = 'Internal server error', code = 'internal_error') {
    super(message, 'internal_error', code);
    this.name = 'InternalError';
  }
}

/**
 * Wraps anything thrown into a GatewayError. Unknown faults lose their message
 * so internals never reach the caller.
 */
export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  return new InternalError();
}

/**
 * Render an error in the OpenAI error envelope
 */
export function toErrorResponse(error: GatewayError): ErrorResponse {
  const body: ErrorResponse = {
    error: {
      message: error.message,
      type: error.kind,
      code: error.code,
    },
  };

  if (error instanceof BadRequestError && error.param) {
    body.error.param = error.param;
  }
  if (error instanceof UnknownModelError || error instanceof UnsupportedModelForProviderError) {
    body.error.available = error.availableModels;
  }
  if (error instanceof ProviderNotConfiguredError) {
    body.error.available = error.configuredProviders;
  }
  if (error instanceof NotFoundError && error.available) {
    body.error.available = error.available;
  }
  if (
    error instanceof UpstreamFailureError ||
    error instanceof UnsupportedModelForProviderError ||
    error instanceof ProviderNotConfiguredError
  ) {
    body.error.provider = error.provider;
  }

  return body;
}
