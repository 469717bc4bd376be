import { logger } from '../shared/logger.js';
import { LlmError } from '../shared/errors.js';
import type { Config } from '../shared/config.js';

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  model: string;
  token_count: number;
}

/**
 * The part of the client the extraction fallback depends on.
 */
export interface ChatClient {
  chat(messages: LlmMessage[]): Promise<LlmResponse>;
}

// OpenAI-compatible chat completions API response shape (partial)
interface OpenAIResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
  model?: string;
  usage?: { total_tokens?: number };
}

/**
 * Client for an OpenAI-compatible chat completions endpoint. The default
 * base URL points at a local Ollama server, which needs no API key.
 */
export class LlmClient implements ChatClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly maxConcurrent: number;
  private activeRequests = 0;

  constructor(config: Config['llm']) {
    this.baseUrl = config.base_url;
    this.apiKey = config.api_key;
    this.model = config.model;
    this.maxTokens = config.max_tokens;
    this.temperature = config.temperature;
    this.timeoutMs = config.timeout_ms;
    this.maxConcurrent = config.max_concurrent;
  }

  async chat(messages: LlmMessage[]): Promise<LlmResponse> {
    while (this.activeRequests >= this.maxConcurrent) {
      await new Promise((resolve) => setTimeout(resolve, 100));
    }

    this.activeRequests++;
    try {
      return await this.doRequest(messages);
    } finally {
      this.activeRequests--;
    }
  }

  private async doRequest(messages: LlmMessage[]): Promise<LlmResponse> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/chat/completions`;

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model: this.model,
          messages,
          max_tokens: this.maxTokens,
          temperature: this.temperature,
          stream: false,
        }),
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new LlmError(`LLM request timed out after ${this.timeoutMs}ms`, { url });
      }
      throw new LlmError(`LLM request failed: ${err instanceof Error ? err.message : String(err)}`, {
        url,
        model: this.model,
      });
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new LlmError(`LLM API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: text.slice(0, 500),
        url,
      });
    }

    let data: OpenAIResponse;
    try {
      data = (await response.json()) as OpenAIResponse;
    } catch {
      throw new LlmError('LLM response is not valid JSON', { url });
    }

    const content = data.choices?.[0]?.message?.content;
    if (!content) {
      throw new LlmError('LLM returned empty content', { response: JSON.stringify(data).slice(0, 200) });
    }

    const tokenCount = data.usage?.total_tokens ?? 0;
    logger.debug({ model: data.model ?? this.model, tokens: tokenCount }, 'LLM call completed');

    return {
      content,
      model: data.model ?? this.model,
      token_count: tokenCount,
    };
  }
}
