export interface LLMRequest {
  model: string;
  prompt: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LLMResponse {
  text: string;
}

/**
 * Text-in/text-out capability of a model backend. Implementations reject with
 * `BackendError` when no completion can be obtained.
 */
export interface LLMClient {
  complete(req: LLMRequest): Promise<LLMResponse>;
}
