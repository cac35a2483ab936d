export type { LLMClient, LLMRequest, LLMResponse } from './llm/types.js';
export { BackendError, isBackendError } from './llm/errors.js';
export type { BackendErrorKind, BackendErrorOptions } from './llm/errors.js';
export { OpenAICompatibleClient } from './llm/openaiCompatibleClient.js';
export type { OpenAICompatibleClientOptions } from './llm/openaiCompatibleClient.js';
export { BedrockClient } from './llm/bedrockClient.js';
export type { BedrockClientOptions, InvokeModelFn } from './llm/bedrockClient.js';
export type {
  CsvExtractionResult,
  CsvStructuredResult,
  ExtractionOptions,
  ExtractionOutcome,
  ExtractionRequest,
  ExtractionResult,
  JsonExtractionResult,
  JsonStructuredResult,
  JsonValue,
  OutputFormat,
  ParseFailure,
  RecordRow,
  RecordTable,
} from './usecases/extraction.types.js';
export { OUTPUT_FORMATS, isOutputFormat } from './usecases/extraction.types.js';
export {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  extractStructuredData,
} from './usecases/extraction.js';
export {
  EXTRACTION_SYSTEM_PROMPT,
  composePrompt,
  formatInstruction,
} from './usecases/extractionPrompts.js';
export { parseResponse } from './parsing/responseParser.js';
export { CsvParseError, parseCsvTable } from './parsing/csvTable.js';
