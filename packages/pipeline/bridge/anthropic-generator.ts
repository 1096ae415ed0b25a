// Anthropic bridge — TextGenerator backed by the Messages API
// One client per generator, built from explicit config. SDK-level retries are
// disabled; retry and backoff belong to the orchestrator.

import Anthropic from '@anthropic-ai/sdk';
import type { CallOptions, TextGenerator } from '../types/capabilities.js';
import { ServiceCallError, isTransientStatus } from '../types/errors.js';
import type { LlmConfig } from '../config/index.js';

export interface MessageRequest {
  model: string;
  max_tokens: number;
  temperature: number;
  messages: Array<{ role: 'user'; content: string }>;
}

export interface MessageResponse {
  content: ReadonlyArray<{ type: string; text?: string }>;
}

/** The slice of the Anthropic client this bridge uses */
export interface MessagesClient {
  messages: {
    create(
      body: MessageRequest,
      options?: { signal?: AbortSignal; timeout?: number; maxRetries?: number },
    ): Promise<MessageResponse>;
  };
}

export function classifyAnthropicError(err: unknown): ServiceCallError {
  if (err instanceof ServiceCallError) return err;
  if (err instanceof Anthropic.APIConnectionError) {
    return new ServiceCallError(`Anthropic connection failed: ${err.message}`, 'llm', true, undefined, err);
  }
  if (err instanceof Anthropic.APIError) {
    const status = err.status;
    // No status means the request was aborted before a response arrived
    const transient = status === undefined ? true : isTransientStatus(status);
    return new ServiceCallError(`Anthropic request failed: ${err.message}`, 'llm', transient, status, err);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ServiceCallError(`Anthropic request failed: ${message}`, 'llm', true, undefined, err);
}

export class AnthropicTextGenerator implements TextGenerator {
  private readonly client: MessagesClient;

  constructor(
    private readonly config: LlmConfig,
    client?: MessagesClient,
  ) {
    this.client = client ?? new Anthropic({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  get model(): string {
    return this.config.model;
  }

  async complete(prompt: string, options: CallOptions = {}): Promise<string> {
    let response: MessageResponse;
    try {
      response = await this.client.messages.create(
        {
          model: this.config.model,
          max_tokens: this.config.maxTokens,
          temperature: this.config.temperature,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal: options.signal, timeout: this.config.timeoutMs, maxRetries: 0 },
      );
    } catch (err) {
      throw classifyAnthropicError(err);
    }

    const text = response.content
      .map(block => (block.type === 'text' && typeof block.text === 'string' ? block.text : ''))
      .join('')
      .trim();

    if (!text) {
      // A reply with no text blocks is a model-side hiccup; worth another attempt
      throw new ServiceCallError('Anthropic response contained no text', 'llm', true);
    }
    return text;
  }
}
