import type {
  CsvExtractionResult,
  ExtractionResult,
  JsonExtractionResult,
  JsonValue,
  OutputFormat,
} from '../usecases/extraction.types.js';
import { parseCsvTable } from './csvTable.js';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Strict JSON.parse: surrounding prose or code fences are a failure, not something to strip.
function parseJsonResponse(rawCompletion: string): JsonExtractionResult {
  try {
    const value: JsonValue = JSON.parse(rawCompletion);
    return { kind: 'structured', format: 'json', value };
  } catch (error) {
    return {
      kind: 'parse-failure',
      format: 'json',
      reason: describe(error),
      rawText: rawCompletion,
    };
  }
}

function parseCsvResponse(rawCompletion: string): CsvExtractionResult {
  try {
    const table = parseCsvTable(rawCompletion);
    return { kind: 'structured', format: 'csv', table };
  } catch (error) {
    return {
      kind: 'parse-failure',
      format: 'csv',
      reason: describe(error),
      rawText: rawCompletion,
    };
  }
}

/**
 * Interprets a raw completion in the requested format. Never throws: anything
 * that cannot be decoded comes back as a `parse-failure` carrying the
 * unmodified text.
 */
export function parseResponse(rawCompletion: string, format: 'json'): JsonExtractionResult;
export function parseResponse(rawCompletion: string, format: 'csv'): CsvExtractionResult;
export function parseResponse(rawCompletion: string, format: OutputFormat): ExtractionResult;
export function parseResponse(rawCompletion: string, format: OutputFormat): ExtractionResult {
  switch (format) {
    case 'json':
      return parseJsonResponse(rawCompletion);
    case 'csv':
      return parseCsvResponse(rawCompletion);
    default: {
      const unsupported: never = format;
      return {
        kind: 'parse-failure',
        format: unsupported,
        reason: `Unsupported output format: ${String(unsupported)}`,
        rawText: rawCompletion,
      };
    }
  }
}
