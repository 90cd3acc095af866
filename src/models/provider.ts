/**
 * @relaygate/models - Adapter factory
 *
 * Builds the CompletionAdapter for a provider descriptor from its `adapter`
 * settings, and a cached lookup for the Execution Client.
 */

import { assertNever, type CompletionAdapter, type ProviderDescriptor } from '@relaygate/core';
import type { AdapterLookup } from '@relaygate/routing';
import { OllamaAdapter } from './ollama.js';
import { OpenAICompatibleAdapter } from './openai.js';

export function createAdapter(provider: ProviderDescriptor): CompletionAdapter {
  const { adapter } = provider;
  switch (adapter.type) {
    case 'ollama':
      return new OllamaAdapter(adapter.model, adapter.baseUrl);
    case 'openai':
      return new OpenAICompatibleAdapter(adapter.model, { baseUrl: adapter.baseUrl, apiKey: adapter.apiKey });
    default:
      return assertNever(adapter.type, 'adapter type');
  }
}

function cacheKey(provider: ProviderDescriptor): string {
  const { type, model, baseUrl, apiKey } = provider.adapter;
  return JSON.stringify([provider.id, type, model, baseUrl ?? '', apiKey ?? '']);
}

/**
 * One adapter per distinct descriptor. A reloaded descriptor with changed
 * adapter settings gets a fresh adapter.
 */
export function createAdapterLookup(factory: (provider: ProviderDescriptor) => CompletionAdapter = createAdapter): AdapterLookup {
  const cache = new Map<string, CompletionAdapter>();
  return (provider) => {
    const key = cacheKey(provider);
    let adapter = cache.get(key);
    if (!adapter) {
      adapter = factory(provider);
      cache.set(key, adapter);
    }
    return adapter;
  };
}
