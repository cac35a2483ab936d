import assert from 'node:assert/strict';
import test from 'node:test';

import type { InvokeModelCommandInput } from '@aws-sdk/client-bedrock-runtime';

import { BedrockClient } from './bedrockClient.js';
import { BackendError } from './errors.js';

function encode(body: unknown): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(body));
}

function namedError(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

test('invokes a Cohere command model and returns the first generation', async () => {
  const inputs: InvokeModelCommandInput[] = [];
  const client = new BedrockClient({
    region: 'us-east-1',
    defaultModel: 'cohere.command-text-v14',
    invokeModel: async (input) => {
      inputs.push(input);
      return encode({ generations: [{ text: 'name,age\nJane,30' }] });
    },
  });

  const response = await client.complete({
    model: '',
    prompt: 'List people',
    systemPrompt: 'Only data',
    temperature: 0,
    maxTokens: 512,
  });

  assert.equal(response.text, 'name,age\nJane,30');
  assert.equal(inputs.length, 1);
  assert.equal(inputs[0].modelId, 'cohere.command-text-v14');
  assert.equal(inputs[0].contentType, 'application/json');
  assert.deepEqual(JSON.parse(String(inputs[0].body)), {
    prompt: 'Only data\n\nList people',
    max_tokens: 512,
    temperature: 0,
    p: 0.01,
    k: 0,
    stop_sequences: [],
    return_likelihoods: 'NONE',
  });
});

test('maps SDK error names to backend error kinds', async () => {
  const cases: Array<[string, string]> = [
    ['AccessDeniedException', 'auth'],
    ['CredentialsProviderError', 'auth'],
    ['ThrottlingException', 'quota'],
    ['ModelTimeoutException', 'timeout'],
    ['Error', 'network'],
  ];

  for (const [name, kind] of cases) {
    const client = new BedrockClient({
      region: 'eu-west-1',
      invokeModel: async () => {
        throw namedError(name, 'boom');
      },
    });

    await assert.rejects(client.complete({ model: 'cohere.command-text-v14', prompt: 'x' }), (error: unknown) => {
      assert.ok(error instanceof BackendError);
      assert.equal(error.kind, kind);
      assert.equal(error.message, 'Bedrock invocation of cohere.command-text-v14 in eu-west-1 failed: boom');
      return true;
    });
  }
});

test('rejects response bodies without generations', async () => {
  const client = new BedrockClient({
    region: 'us-east-1',
    invokeModel: async () => encode({ generations: [] }),
  });

  await assert.rejects(client.complete({ model: 'cohere.command-text-v14', prompt: 'x' }), {
    kind: 'response',
    message: 'Bedrock response did not include a generation text.',
  });
});

test('requires a model id', async () => {
  const client = new BedrockClient({
    region: 'us-east-1',
    invokeModel: async () => encode({}),
  });

  await assert.rejects(client.complete({ model: '', prompt: 'x' }), { kind: 'configuration' });
});
