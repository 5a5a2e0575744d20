// Provider template loader
import type { ProviderTemplate } from '../../types/providers.js';

import catalog from './catalog.json' with { type: 'json' };

// Catalog order is registration order
const templates: ProviderTemplate[] = catalog;

/**
 * Get all built-in provider templates in catalog order
 */
export function getAllTemplates(): ProviderTemplate[] {
  return templates.map(template => ({ ...template, models: [...template.models] }));
}
