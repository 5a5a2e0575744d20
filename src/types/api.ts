// API-related type definitions

export interface ApiKey {
  id: string;
  keyHash: string;
  name: string;
  description: string;
  isActive: boolean;
  rateLimit: number;
  usageCount: number;
  createdAt: Date;
  lastUsedAt: Date | null;
}

export interface NewApiKey {
  id: string;
  keyHash: string;
  name: string;
  description: string;
  rateLimit: number;
  createdAt: Date;
}

export interface CreatedApiKey {
  /** Raw secret - only available at creation */
  key: string;
  apiKey: ApiKey;
}

/**
 * Identity attached to an authenticated request
 */
export interface AuthContext {
  apiKey: ApiKey;
  method: 'api_key' | 'bearer_token';
  tokenId?: string;
}

export interface UsageRecord {
  id: string;
  apiKeyId: string;
  provider: string;
  model: string;
  endpoint: string;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  cost: number;
  timestamp: Date;
}

export interface ProviderUsage {
  requests: number;
  tokens: number;
  cost: number;
}

export interface UsageSummary {
  apiKeyId: string;
  totalRequests: number;
  totalTokens: number;
  totalCost: number;
  providerBreakdown: Record<string, ProviderUsage>;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
