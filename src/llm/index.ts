import type { LLMAdapter } from './adapter.js';
import { OpenAIAdapter } from './openai.js';
import { getConfig } from '../config.js';

// Reusable Singleton cache
const adapterCache = new Map<string, LLMAdapter>();

export function getLLMAdapter(): LLMAdapter {
  const config = getConfig();
  const provider = config.llm.provider;

  const cached = adapterCache.get(provider);
  if (cached) return cached;

  const adapter = new OpenAIAdapter({
    apiKey: config.llm.apiKey,
    model: config.llm.blogModel,
    timeoutMs: config.requestTimeoutMs,
  });

  adapterCache.set(provider, adapter);
  return adapter;
}

export * from './adapter.js';
