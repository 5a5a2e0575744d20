// Provider type definitions

/**
 * Catalog entry for a built-in provider, loaded from templates/catalog.json
 */
export interface ProviderTemplate {
  id: string;
  displayName: string;
  baseUrl: string;
  models: string[];
}

/**
 * A provider enabled by configuration
 */
export interface ProviderConfig {
  name: string;
  baseUrl: string;
  apiKey: string;
  models: string[];
  timeoutMs: number;
}

export interface ProviderStatus {
  name: string;
  enabled: boolean;
  models: string[];
  modelCount: number;
  baseUrl: string;
}
