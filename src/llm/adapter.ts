import type { LLMResponse } from '../types.js';

export interface GenerateOptions {
  model?: string;
  temperature?: number;
}

export interface LLMAdapter {
  /** Sends one user-role prompt. Rejects with a BackendError on any failure. */
  generate(prompt: string, options?: GenerateOptions): Promise<LLMResponse>;
}
