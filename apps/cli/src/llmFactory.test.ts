import assert from 'node:assert/strict';
import test from 'node:test';

import { BedrockClient, OpenAICompatibleClient } from '@struct-extract/core';

import { createLlmClient } from './llmFactory.js';

test('creates an OpenAI-compatible client for the openai provider', () => {
  const client = createLlmClient({
    provider: 'openai',
    baseUrl: 'http://localhost:11434/v1',
    model: 'llama3',
  });
  assert.ok(client instanceof OpenAICompatibleClient);
});

test('creates a Bedrock client for the bedrock provider', () => {
  const client = createLlmClient({
    provider: 'bedrock',
    region: 'us-east-1',
    model: 'cohere.command-text-v14',
  });
  assert.ok(client instanceof BedrockClient);
});
