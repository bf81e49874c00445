import OpenAI from 'openai';
import type { GenerateOptions, LLMAdapter } from './adapter.js';
import type { LLMResponse } from '../types.js';
import { BackendError, errorMessage } from '../errors.js';

export interface OpenAIAdapterOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class OpenAIAdapter implements LLMAdapter {
  private client: OpenAI;
  private model: string;

  constructor(options: OpenAIAdapterOptions) {
    if (!options.apiKey) {
      throw new BackendError('OpenAI API key is required');
    }

    // Retries are the caller's decision, so the SDK's own are turned off.
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
    this.model = options.model;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<LLMResponse> {
    const model = options.model ?? this.model;

    let content: string;
    try {
      const response = await this.client.chat.completions.create({
        model,
        messages: [{ role: 'user', content: prompt }],
        temperature: options.temperature,
      });
      content = response.choices[0]?.message?.content ?? '';
    } catch (error) {
      throw new BackendError(`OpenAI request failed: ${errorMessage(error)}`);
    }

    if (!content.trim()) {
      throw new BackendError('No content generated from OpenAI');
    }

    return {
      content: content.trim(),
      provider: 'openai',
      model,
    };
  }
}
