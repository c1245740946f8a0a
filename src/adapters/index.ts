/**
 * Provider Adapters Index
 *
 * Maps each configured provider kind to its adapter factory.
 */

import { ProviderAdapter } from './base.js';
import { PassthroughAdapter } from './passthrough.js';
import { FieldRemappingAdapter, type FieldRemappingOptions } from './fieldRemapping.js';
import type { ProviderKind } from '../services/config.js';
import { ConfigError } from '../services/errors.js';

export type AdapterOptions = FieldRemappingOptions;

const adapterFactories: Record<ProviderKind, (options: AdapterOptions) => ProviderAdapter> = {
  passthrough: () => new PassthroughAdapter(),
  field_remapping: (options) => new FieldRemappingAdapter(options),
};

/**
 * Get the adapter for a provider kind
 *
 * @throws ConfigError for an unknown kind
 */
export function createAdapter(kind: string, options: AdapterOptions = {}): ProviderAdapter {
  if (!isProviderKind(kind)) {
    throw new ConfigError(`Unknown backend provider: ${kind}`);
  }
  return adapterFactories[kind](options);
}

function isProviderKind(value: string): value is ProviderKind {
  return Object.hasOwn(adapterFactories, value);
}

export { ProviderAdapter, type BackendPayload } from './base.js';
export { PassthroughAdapter } from './passthrough.js';
export { FieldRemappingAdapter, extractQuestion, buildContext, estimateTokens } from './fieldRemapping.js';
