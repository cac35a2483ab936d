import assert from 'node:assert/strict';
import test from 'node:test';

import { BackendError } from './errors.js';
import { OpenAICompatibleClient } from './openaiCompatibleClient.js';

type FetchImpl = typeof globalThis.fetch;

interface CapturedCall {
  url: string;
  init?: RequestInit;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createFetch(response: Response, calls: CapturedCall[] = []): FetchImpl {
  return async (input, init) => {
    calls.push({ url: String(input), init });
    return response;
  };
}

test('posts chat messages and returns the first choice content', async () => {
  const calls: CapturedCall[] = [];
  const client = new OpenAICompatibleClient('http://localhost:11434/v1/', 'test-secret', 'llama3', {
    fetchImpl: createFetch(jsonResponse({ choices: [{ message: { content: '{"a":1}' } }] }), calls),
  });

  const response = await client.complete({
    model: '',
    prompt: 'Extract',
    systemPrompt: 'Be terse',
    temperature: 0,
    maxTokens: 256,
  });

  assert.equal(response.text, '{"a":1}');
  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, 'http://localhost:11434/v1/chat/completions');
  assert.equal(calls[0].init?.method, 'POST');
  assert.deepEqual(calls[0].init?.headers, {
    'Content-Type': 'application/json',
    Authorization: 'Bearer test-secret',
  });
  assert.deepEqual(JSON.parse(String(calls[0].init?.body)), {
    model: 'llama3',
    messages: [
      { role: 'system', content: 'Be terse' },
      { role: 'user', content: 'Extract' },
    ],
    temperature: 0,
    max_tokens: 256,
  });
});

test('maps HTTP status codes to backend error kinds', async () => {
  const cases: Array<[number, string]> = [
    [401, 'auth'],
    [403, 'auth'],
    [429, 'quota'],
    [500, 'response'],
  ];

  for (const [status, kind] of cases) {
    const client = new OpenAICompatibleClient('http://localhost:1234/v1', undefined, 'llama3', {
      fetchImpl: createFetch(new Response('denied', { status })),
    });

    await assert.rejects(client.complete({ model: '', prompt: 'x' }), (error: unknown) => {
      assert.ok(error instanceof BackendError);
      assert.equal(error.kind, kind);
      assert.equal(error.status, status);
      assert.equal(error.message, `LLM request failed with status ${status}: denied`);
      return true;
    });
  }
});

test('reports network failures as network errors', async () => {
  const client = new OpenAICompatibleClient('http://localhost:1234/v1', undefined, 'llama3', {
    fetchImpl: async () => {
      throw new TypeError('fetch failed');
    },
  });

  await assert.rejects(client.complete({ model: '', prompt: 'x' }), {
    name: 'BackendError',
    kind: 'network',
    message: 'LLM request to http://localhost:1234/v1/chat/completions failed: fetch failed',
  });
});

test('aborts and reports a timeout when the backend does not answer in time', async () => {
  const client = new OpenAICompatibleClient('http://localhost:1234/v1', undefined, 'llama3', {
    timeoutMs: 5,
    fetchImpl: (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      }),
  });

  await assert.rejects(client.complete({ model: '', prompt: 'x' }), {
    kind: 'timeout',
    message: 'LLM request timed out after 5ms',
  });
});

test('keeps the timeout running while the response body is read', async () => {
  const client = new OpenAICompatibleClient('http://localhost:1234/v1', undefined, 'llama3', {
    timeoutMs: 5,
    fetchImpl: async (_input, init) =>
      new Response(
        new ReadableStream<Uint8Array>({
          start(stream) {
            init?.signal?.addEventListener('abort', () => stream.error(new Error('aborted')));
          },
        }),
        { status: 200 },
      ),
  });

  await assert.rejects(client.complete({ model: '', prompt: 'x' }), {
    kind: 'timeout',
    message: 'LLM request timed out after 5ms',
  });
});

test('rejects payloads without message content', async () => {
  const client = new OpenAICompatibleClient('http://localhost:1234/v1', undefined, 'llama3', {
    fetchImpl: createFetch(jsonResponse({ choices: [] })),
  });

  await assert.rejects(client.complete({ model: '', prompt: 'x' }), {
    kind: 'response',
    message: 'LLM response did not include a message content string.',
  });
});

test('requires a model name', async () => {
  const client = new OpenAICompatibleClient('http://localhost:1234/v1', undefined, undefined, {
    fetchImpl: createFetch(jsonResponse({})),
  });

  await assert.rejects(client.complete({ model: '', prompt: 'x' }), { kind: 'configuration' });
});
