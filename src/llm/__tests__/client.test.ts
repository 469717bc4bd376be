import { describe, it, expect, vi, afterEach } from 'vitest';
import { LlmClient } from '../client.js';
import { ConfigSchema } from '../../shared/config.js';
import { LlmError } from '../../shared/errors.js';

function llmConfig(overrides: Record<string, unknown> = {}) {
  return ConfigSchema.parse({ llm: overrides }).llm;
}

function completion(content: string | null): Response {
  return new Response(
    JSON.stringify({ choices: [{ message: { content } }], model: 'tinydolphin', usage: { total_tokens: 42 } }),
    { status: 200, headers: { 'Content-Type': 'application/json' } },
  );
}

describe('LlmClient', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('posts an OpenAI-compatible chat request', async () => {
    const mockFetch = vi.fn().mockResolvedValue(completion('{"title": "Quiz"}'));
    globalThis.fetch = mockFetch;

    const client = new LlmClient(llmConfig({ base_url: 'http://localhost:11434/v1/' }));
    const response = await client.chat([{ role: 'user', content: 'hello' }]);

    expect(response).toEqual({ content: '{"title": "Quiz"}', model: 'tinydolphin', token_count: 42 });
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('http://localhost:11434/v1/chat/completions');
    expect(init.headers['Authorization']).toBeUndefined();
    expect(JSON.parse(init.body)).toEqual({
      model: 'tinydolphin',
      messages: [{ role: 'user', content: 'hello' }],
      max_tokens: 500,
      temperature: 0.1,
      stream: false,
    });
  });

  it('sends a bearer token when an API key is set', async () => {
    const mockFetch = vi.fn().mockResolvedValue(completion('ok'));
    globalThis.fetch = mockFetch;

    await new LlmClient(llmConfig({ api_key: 'test-secret' })).chat([{ role: 'user', content: 'hi' }]);
    const [, init] = mockFetch.mock.calls[0];
    expect(init.headers['Authorization']).toBe('Bearer test-secret');
  });

  it('holds requests beyond max_concurrent until one finishes', async () => {
    let active = 0;
    let peak = 0;
    globalThis.fetch = vi.fn().mockImplementation(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 20));
      active--;
      return completion('ok');
    });

    const client = new LlmClient(llmConfig({ max_concurrent: 1 }));
    const responses = await Promise.all([
      client.chat([{ role: 'user', content: 'first' }]),
      client.chat([{ role: 'user', content: 'second' }]),
    ]);

    expect(responses.map((r) => r.content)).toEqual(['ok', 'ok']);
    expect(peak).toBe(1);
  });

  it('raises LlmError on an HTTP error', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('model not found', { status: 404, statusText: 'Not Found' }));

    const chat = new LlmClient(llmConfig()).chat([{ role: 'user', content: 'hi' }]);
    await expect(chat).rejects.toBeInstanceOf(LlmError);
    await expect(chat).rejects.toThrow('LLM API error: 404 Not Found');
  });

  it('raises LlmError on empty content', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(completion(null));
    await expect(new LlmClient(llmConfig()).chat([{ role: 'user', content: 'hi' }])).rejects.toThrow(
      'LLM returned empty content',
    );
  });

  it('raises LlmError when the server is unreachable', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'));
    await expect(new LlmClient(llmConfig()).chat([{ role: 'user', content: 'hi' }])).rejects.toThrow(
      'LLM request failed: fetch failed',
    );
  });
});
