export type OutputFormat = 'json' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'csv'];

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type RecordRow = Record<string, string>;

export interface RecordTable {
  /** Header names in source order. */
  columns: string[];
  rows: RecordRow[];
}

export interface ExtractionRequest {
  readonly rawPrompt: string;
  readonly format: OutputFormat;
}

export interface JsonStructuredResult {
  kind: 'structured';
  format: 'json';
  value: JsonValue;
}

export interface CsvStructuredResult {
  kind: 'structured';
  format: 'csv';
  table: RecordTable;
}

export interface ParseFailure<F extends OutputFormat = OutputFormat> {
  kind: 'parse-failure';
  format: F;
  reason: string;
  /** The completion exactly as the backend returned it. */
  rawText: string;
}

export type JsonExtractionResult = JsonStructuredResult | ParseFailure<'json'>;

export type CsvExtractionResult = CsvStructuredResult | ParseFailure<'csv'>;

export type ExtractionResult = JsonExtractionResult | CsvExtractionResult;

export interface ExtractionOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ExtractionOutcome {
  result: ExtractionResult;
  composedPrompt: string;
  rawCompletion: string;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'json' || value === 'csv';
}
