// Language-model service used by the planner and the response composer
// Backed by the Anthropic SDK; every call carries a timeout and a bounded
// retry with exponential backoff.

import Anthropic from '@anthropic-ai/sdk';
import type { LlmConfig } from '../config/index.js';
import { createLogger, errorMessage } from '../utils/log.js';
import { withRetry } from '../utils/retry.js';

const log = createLogger('LlmService');

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens?: number;
}

export interface LlmService {
  readonly name: string;
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<string>;
}

export class AnthropicLlmService implements LlmService {
  readonly name = 'anthropic';
  private client: Anthropic | null = null;

  constructor(private readonly config: LlmConfig) {}

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    const client = this.getClient();
    const { model, maxTokens, retries, backoffMs, timeoutMs } = this.config;

    return withRetry(async attemptSignal => {
      const response = await client.messages.create({
        model,
        max_tokens: request.maxTokens ?? maxTokens,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      }, { signal: attemptSignal });

      const text = response.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
      if (!text) throw new Error('Model returned no text content');
      return text;
    }, {
      retries,
      backoffMs,
      timeoutMs,
      signal,
      onRetry: (attempt, err) => log.warn('retrying model call', { attempt, error: errorMessage(err) }),
    });
  }

  private getClient(): Anthropic {
    if (!this.config.apiKey) {
      throw new Error('ANTHROPIC_API_KEY is not set');
    }
    // Retries are handled by withRetry so backoff stays under our control
    this.client ??= new Anthropic({ apiKey: this.config.apiKey, maxRetries: 0 });
    return this.client;
  }
}
