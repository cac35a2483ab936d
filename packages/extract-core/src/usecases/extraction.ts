import { BackendError, isBackendError } from '../llm/errors.js';
import type { LLMClient, LLMResponse } from '../llm/types.js';
import { parseResponse } from '../parsing/responseParser.js';
import type {
  ExtractionOptions,
  ExtractionOutcome,
  ExtractionRequest,
} from './extraction.types.js';
import { EXTRACTION_SYSTEM_PROMPT, composePrompt } from './extractionPrompts.js';

export const DEFAULT_TEMPERATURE = 0;
export const DEFAULT_MAX_TOKENS = 4096;

function toBackendError(error: unknown): BackendError {
  if (isBackendError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new BackendError(message, { kind: 'unknown', cause: error });
}

export async function extractStructuredData(
  llm: LLMClient,
  request: ExtractionRequest,
  options: ExtractionOptions = {},
): Promise<ExtractionOutcome> {
  const composedPrompt = composePrompt(request.rawPrompt, request.format);

  let response: LLMResponse;

  try {
    response = await llm.complete({
      model: (options.model ?? '').trim(),
      prompt: composedPrompt,
      systemPrompt: EXTRACTION_SYSTEM_PROMPT,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
    });
  } catch (error) {
    throw toBackendError(error);
  }

  return {
    result: parseResponse(response.text, request.format),
    composedPrompt,
    rawCompletion: response.text,
  };
}
