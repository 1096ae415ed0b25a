import { describe, it, expect, vi } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { AnthropicTextGenerator, classifyAnthropicError } from '../bridge/anthropic-generator.js';
import type { MessageRequest, MessageResponse } from '../bridge/anthropic-generator.js';
import { ServiceCallError } from '../types/errors.js';
import { TEST_LLM } from './helpers.js';

function fakeClient(reply: MessageResponse) {
  const create = vi.fn(async (
    _body: MessageRequest,
    _options?: { signal?: AbortSignal; timeout?: number; maxRetries?: number },
  ): Promise<MessageResponse> => reply);
  return { create, client: { messages: { create } } };
}

describe('AnthropicTextGenerator', () => {
  it('sends one user message and joins the text blocks', async () => {
    const { create, client } = fakeClient({
      content: [
        { type: 'text', text: '  Spending held ' },
        { type: 'tool_use' },
        { type: 'text', text: 'steady.  ' },
      ],
    });
    const generator = new AnthropicTextGenerator(TEST_LLM, client);
    const controller = new AbortController();

    const text = await generator.complete('Summarise April', { signal: controller.signal });

    expect(text).toBe('Spending held steady.');
    expect(generator.model).toBe('test-model');
    expect(create).toHaveBeenCalledWith(
      {
        model: 'test-model',
        max_tokens: 256,
        temperature: 0,
        messages: [{ role: 'user', content: 'Summarise April' }],
      },
      { signal: controller.signal, timeout: 1000, maxRetries: 0 },
    );
  });

  it('treats a reply without text as transient', async () => {
    const { client } = fakeClient({ content: [] });

    const err = await new AnthropicTextGenerator(TEST_LLM, client).complete('x').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ServiceCallError);
    if (!(err instanceof ServiceCallError)) return;
    expect(err.transient).toBe(true);
    expect(err.message).toBe('Anthropic response contained no text');
  });

  it('classifies SDK failures', async () => {
    const { create, client } = fakeClient({ content: [] });
    create.mockRejectedValueOnce(new Anthropic.APIError(401, undefined, 'invalid x-api-key', undefined));

    const err = await new AnthropicTextGenerator(TEST_LLM, client).complete('x').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ServiceCallError);
    if (!(err instanceof ServiceCallError)) return;
    expect(err.transient).toBe(false);
    expect(err.status).toBe(401);
    expect(err.service).toBe('llm');
  });
});

describe('classifyAnthropicError', () => {
  it('retries rate limits and server errors', () => {
    const limited = classifyAnthropicError(new Anthropic.APIError(429, undefined, 'rate limited', undefined));
    expect(limited.transient).toBe(true);
    expect(limited.status).toBe(429);
    expect(limited.message).toContain('rate limited');

    expect(classifyAnthropicError(new Anthropic.APIError(529, undefined, 'overloaded', undefined)).transient).toBe(true);
    expect(classifyAnthropicError(new Anthropic.APIError(400, undefined, 'bad request', undefined)).transient).toBe(false);
  });

  it('retries connection failures', () => {
    const err = classifyAnthropicError(new Anthropic.APIConnectionError({ message: 'socket hang up' }));
    expect(err.transient).toBe(true);
    expect(err.status).toBeUndefined();
    expect(err.message).toBe('Anthropic connection failed: socket hang up');
  });

  it('passes classified errors through', () => {
    const original = new ServiceCallError('already classified', 'llm', false);
    expect(classifyAnthropicError(original)).toBe(original);
    expect(classifyAnthropicError(new Error('boom')).transient).toBe(true);
  });
});
