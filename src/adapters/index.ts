/**
 * Provider Adapters Index
 *
 * Every configured provider speaks the OpenAI chat completions API, so the
 * factory hands each its own OpenAICompatibleAdapter bound to its config.
 */

import type { ProviderAdapter } from './base.js';
import { OpenAICompatibleAdapter } from './openai.js';
import type { ProviderConfig } from '../types/providers.js';

export { ProviderAdapter, type CallOptions } from './base.js';
export { OpenAICompatibleAdapter } from './openai.js';

export function createAdapter(config: ProviderConfig): ProviderAdapter {
  return new OpenAICompatibleAdapter(config);
}
