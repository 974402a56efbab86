import { ConfigError } from '../errors';
import type { CustomAdapter } from '../types';
import tempmailo from './tempmailo';

/**
 * Every site-specific fetch protocol the aggregator knows. Source
 * configuration refers to these by name; names are resolved once, at load.
 */
export const CUSTOM_ADAPTERS = {
  tempmailo,
} satisfies Record<string, CustomAdapter>;

export type CustomAdapterName = keyof typeof CUSTOM_ADAPTERS;

export function isCustomAdapterName(name: string): name is CustomAdapterName {
  return Object.prototype.hasOwnProperty.call(CUSTOM_ADAPTERS, name);
}

export function resolveAdapter(name: string): CustomAdapter {
  if (!isCustomAdapterName(name)) {
    throw new ConfigError(`unknown custom adapter "${name}" (known: ${Object.keys(CUSTOM_ADAPTERS).join(', ')})`);
  }
  return CUSTOM_ADAPTERS[name];
}
