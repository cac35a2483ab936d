import {
  BedrockRuntimeClient,
  BedrockRuntimeServiceException,
  InvokeModelCommand,
  type InvokeModelCommandInput,
} from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';

import { BackendError, type BackendErrorKind } from './errors.js';
import type { LLMClient, LLMRequest, LLMResponse } from './types.js';

export type InvokeModelFn = (input: InvokeModelCommandInput) => Promise<Uint8Array>;

export interface BedrockClientOptions {
  region: string;
  defaultModel?: string;
  /** Socket timeout for the SDK's HTTP handler. */
  timeoutMs?: number;
  /** Replaces the SDK call; tests pass a stub here. */
  invokeModel?: InvokeModelFn;
}

interface CohereSampling {
  p: number;
  k: number;
  stop_sequences: string[];
  return_likelihoods: 'NONE' | 'GENERATION' | 'ALL';
}

// Sampling settings for Cohere Command text models.
const COHERE_DEFAULTS: CohereSampling = {
  p: 0.01,
  k: 0,
  stop_sequences: [],
  return_likelihoods: 'NONE',
};

const DEFAULT_MAX_TOKENS = 4096;

const cohereResponseSchema = z.object({
  generations: z
    .array(
      z.object({
        text: z.string(),
      }),
    )
    .min(1),
});

const AUTH_ERRORS = new Set([
  'AccessDeniedException',
  'UnrecognizedClientException',
  'ExpiredTokenException',
  'CredentialsProviderError',
]);

const QUOTA_ERRORS = new Set(['ThrottlingException', 'ServiceQuotaExceededException']);

const TIMEOUT_ERRORS = new Set(['ModelTimeoutException', 'TimeoutError']);

function classify(error: unknown): { kind: BackendErrorKind; status?: number } {
  const name = error instanceof Error ? error.name : '';

  if (AUTH_ERRORS.has(name)) {
    return { kind: 'auth' };
  }

  if (QUOTA_ERRORS.has(name)) {
    return { kind: 'quota' };
  }

  if (TIMEOUT_ERRORS.has(name)) {
    return { kind: 'timeout' };
  }

  if (error instanceof BedrockRuntimeServiceException) {
    return { kind: 'response', status: error.$metadata.httpStatusCode };
  }

  return { kind: 'network' };
}

function createSdkInvoker(region: string, timeoutMs?: number): InvokeModelFn {
  const sdk = new BedrockRuntimeClient({
    region,
    ...(typeof timeoutMs === 'number' ? { requestHandler: { requestTimeout: timeoutMs } } : {}),
  });
  return async (input) => {
    const output = await sdk.send(new InvokeModelCommand(input));
    return output.body;
  };
}

export class BedrockClient implements LLMClient {
  private readonly region: string;

  private readonly defaultModel?: string;

  private readonly invokeModel: InvokeModelFn;

  constructor(options: BedrockClientOptions) {
    this.region = options.region;
    this.defaultModel = options.defaultModel;
    this.invokeModel = options.invokeModel ?? createSdkInvoker(options.region, options.timeoutMs);
  }

  async complete(req: LLMRequest): Promise<LLMResponse> {
    const modelId = req.model || this.defaultModel;

    if (!modelId) {
      throw new BackendError('Bedrock model id is required.', { kind: 'configuration' });
    }

    const prompt = req.systemPrompt ? `${req.systemPrompt}\n\n${req.prompt}` : req.prompt;
    const body = {
      prompt,
      max_tokens: req.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: req.temperature ?? 0,
      ...COHERE_DEFAULTS,
    };

    let bytes: Uint8Array;

    try {
      bytes = await this.invokeModel({
        modelId,
        contentType: 'application/json',
        accept: 'application/json',
        body: JSON.stringify(body),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const { kind, status } = classify(error);
      throw new BackendError(`Bedrock invocation of ${modelId} in ${this.region} failed: ${message}`, {
        kind,
        status,
        cause: error,
      });
    }

    let data: unknown;

    try {
      data = JSON.parse(new TextDecoder().decode(bytes));
    } catch (error) {
      throw new BackendError('Bedrock response body was not valid JSON.', {
        kind: 'response',
        cause: error,
      });
    }

    const parsed = cohereResponseSchema.safeParse(data);

    if (!parsed.success) {
      throw new BackendError('Bedrock response did not include a generation text.', {
        kind: 'response',
        cause: parsed.error,
      });
    }

    return {
      text: parsed.data.generations[0].text,
    };
  }
}
