/**
 * Pricing Table
 *
 * Static USD prices per 1,000 tokens. Lookup order: exact model under the
 * provider, then the provider default, then the global default.
 */

export interface ProviderPricing {
  models: Record<string, number>;
  default?: number;
}

export type PricingTable = Record<string, ProviderPricing>;

export const GLOBAL_DEFAULT_PRICE_PER_1K = 0.001;

export const DEFAULT_PRICING: PricingTable = {
  openai: {
    models: {
      'gpt-4': 0.03,
      'gpt-4-turbo': 0.01,
      'gpt-4o': 0.005,
      'gpt-4o-mini': 0.0015,
      'gpt-3.5-turbo': 0.0015,
    },
  },
  groq: {
    models: {},
    default: 0.0001,
  },
  gemini: {
    models: {},
    default: 0.001,
  },
};

export function getPricePer1K(
  provider: string,
  model: string,
  table: PricingTable = DEFAULT_PRICING,
  globalDefault: number = GLOBAL_DEFAULT_PRICE_PER_1K
): number {
  const pricing = table[provider];
  if (!pricing) {
    return globalDefault;
  }
  return pricing.models[model] ?? pricing.default ?? globalDefault;
}

/**
 * Cost in USD of a request's total tokens
 */
export function calculateCost(
  provider: string,
  model: string,
  totalTokens: number,
  table: PricingTable = DEFAULT_PRICING
): number {
  return (totalTokens / 1000) * getPricePer1K(provider, model, table);
}
