import { describe, it, expect, vi, beforeEach } from 'vitest';

const { create, constructed } = vi.hoisted(() => ({
  create: vi.fn(),
  constructed: [] as unknown[],
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create };
    constructor(options: unknown) {
      constructed.push(options);
    }
  },
}));

const { AnthropicLlmService } = await import('../planner/llm-service.js');

const config = {
  apiKey: 'test-secret',
  model: 'test-model',
  timeoutMs: 1000,
  retries: 1,
  backoffMs: 0,
  maxTokens: 256,
};

describe('AnthropicLlmService', () => {
  beforeEach(() => {
    create.mockReset();
    constructed.length = 0;
  });

  it('sends the prompt and joins the text blocks', async () => {
    create.mockResolvedValueOnce({
      content: [{ type: 'text', text: '{"source": ' }, { type: 'text', text: '"orders"}' }],
    });
    const service = new AnthropicLlmService(config);

    const text = await service.complete({ system: 'sys', prompt: 'Question: hi', maxTokens: 64 });

    expect(text).toBe('{"source": "orders"}');
    expect(create.mock.calls[0][0]).toEqual({
      model: 'test-model',
      max_tokens: 64,
      system: 'sys',
      messages: [{ role: 'user', content: 'Question: hi' }],
    });
    expect(constructed).toEqual([{ apiKey: 'test-secret', maxRetries: 0 }]);
  });

  it('retries a failed call', async () => {
    create
      .mockRejectedValueOnce(new Error('overloaded'))
      .mockResolvedValueOnce({ content: [{ type: 'text', text: 'ok' }] });
    const service = new AnthropicLlmService(config);

    expect(await service.complete({ system: 's', prompt: 'p' })).toBe('ok');
    expect(create).toHaveBeenCalledTimes(2);
    expect(create.mock.calls[1][0].max_tokens).toBe(256);
  });

  it('fails on an answer without text', async () => {
    create.mockResolvedValue({ content: [{ type: 'tool_use', id: 't', name: 'x', input: {} }] });
    const service = new AnthropicLlmService({ ...config, retries: 0 });
    await expect(service.complete({ system: 's', prompt: 'p' })).rejects.toThrow('Model returned no text content');
  });

  it('requires an API key', async () => {
    const service = new AnthropicLlmService({ ...config, apiKey: undefined });
    await expect(service.complete({ system: 's', prompt: 'p' })).rejects.toThrow('ANTHROPIC_API_KEY is not set');
    expect(create).not.toHaveBeenCalled();
  });
});
