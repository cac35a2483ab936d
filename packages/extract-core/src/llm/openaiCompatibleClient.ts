import { z } from 'zod';

import { BackendError } from './errors.js';
import type { LLMClient, LLMRequest, LLMResponse } from './types.js';

type FetchImpl = typeof globalThis.fetch;

function resolveFetch(): FetchImpl {
  if (typeof globalThis.fetch === 'function') {
    return globalThis.fetch;
  }

  throw new BackendError(
    'Global fetch API is not available in this runtime. Provide fetchImpl when constructing OpenAICompatibleClient.',
    { kind: 'configuration' },
  );
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .min(1),
});

export interface OpenAICompatibleClientOptions {
  fetchImpl?: FetchImpl;
  /** Abort the request after this many milliseconds. No limit when omitted. */
  timeoutMs?: number;
}

function statusToKind(status: number): 'auth' | 'quota' | 'response' {
  if (status === 401 || status === 403) {
    return 'auth';
  }

  if (status === 429) {
    return 'quota';
  }

  return 'response';
}

export class OpenAICompatibleClient implements LLMClient {
  private readonly baseUrl: string;

  private readonly apiKey?: string;

  private readonly defaultModel?: string;

  private readonly fetchImpl: FetchImpl;

  private readonly timeoutMs?: number;

  constructor(
    baseUrl: string,
    apiKey?: string,
    defaultModel?: string,
    options: OpenAICompatibleClientOptions = {},
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.apiKey = apiKey;
    this.defaultModel = defaultModel;
    this.fetchImpl = options.fetchImpl ?? resolveFetch();
    this.timeoutMs = options.timeoutMs;
  }

  async complete(req: LLMRequest): Promise<LLMResponse> {
    const model = req.model || this.defaultModel;

    if (!model) {
      throw new BackendError(
        'LLM model name is required. Provide it in the request or configure a default model.',
        { kind: 'configuration' },
      );
    }

    const messages: Array<{ role: 'system' | 'user'; content: string }> = [];

    if (req.systemPrompt) {
      messages.push({ role: 'system', content: req.systemPrompt });
    }

    messages.push({ role: 'user', content: req.prompt });

    const payload: Record<string, unknown> = {
      model,
      messages,
    };

    if (typeof req.temperature === 'number') {
      payload.temperature = req.temperature;
    }

    if (typeof req.maxTokens === 'number') {
      payload.max_tokens = req.maxTokens;
    }

    const url = `${this.baseUrl}/chat/completions`;
    const controller = new AbortController();
    const timer =
      typeof this.timeoutMs === 'number'
        ? setTimeout(() => controller.abort(), this.timeoutMs)
        : undefined;

    let response: Response;
    let body: string;

    // The timer also covers reading the body, which can stall after the headers arrive.
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      body = await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new BackendError(`LLM request timed out after ${this.timeoutMs}ms`, {
          kind: 'timeout',
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new BackendError(`LLM request to ${url} failed: ${message}`, {
        kind: 'network',
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      throw new BackendError(`LLM request failed with status ${response.status}: ${body}`, {
        kind: statusToKind(response.status),
        status: response.status,
      });
    }

    let data: unknown;

    try {
      data = JSON.parse(body);
    } catch (error) {
      throw new BackendError('LLM response body was not valid JSON.', {
        kind: 'response',
        status: response.status,
        cause: error,
      });
    }

    const parsed = chatCompletionSchema.safeParse(data);

    if (!parsed.success) {
      throw new BackendError('LLM response did not include a message content string.', {
        kind: 'response',
        status: response.status,
        cause: parsed.error,
      });
    }

    return {
      text: parsed.data.choices[0].message.content,
    };
  }
}

export default OpenAICompatibleClient;
