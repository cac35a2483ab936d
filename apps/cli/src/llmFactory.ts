import { BedrockClient, OpenAICompatibleClient, type LLMClient } from '@struct-extract/core';

export type LlmClientOptions =
  | {
      provider: 'openai';
      baseUrl: string;
      apiKey?: string;
      model: string;
      timeoutMs?: number;
    }
  | {
      provider: 'bedrock';
      region: string;
      model: string;
      timeoutMs?: number;
    };

export type LlmFactory = (options: LlmClientOptions) => LLMClient;

export const createLlmClient: LlmFactory = (options) => {
  switch (options.provider) {
    case 'openai':
      return new OpenAICompatibleClient(options.baseUrl, options.apiKey, options.model, {
        timeoutMs: options.timeoutMs,
      });
    case 'bedrock':
      return new BedrockClient({
        region: options.region,
        defaultModel: options.model,
        timeoutMs: options.timeoutMs,
      });
    default: {
      const unsupported: never = options;
      throw new Error(`Unsupported provider: ${JSON.stringify(unsupported)}`);
    }
  }
};
