import type { OutputFormat } from '@struct-extract/core';

import type { AuditLogger } from './auditLogger.js';

export interface ProcessIO {
  writeStdout(message: string): void;
  writeStderr(message: string): void;
  setExitCode(code: number): void;
  /** True when stdin is a terminal rather than a pipe or file. */
  isStdinInteractive(): boolean;
}

export interface CliGlobals {
  quiet: boolean;
  dryRun: boolean;
  logFile?: string;
}

export interface CliCommandContext {
  globals: CliGlobals;
  argv: string[];
  io: ProcessIO;
}

export type OutputScope = 'result' | 'info' | 'error';

export interface TextOutput {
  kind: 'text';
  text: string;
  scope?: OutputScope;
}

export interface JsonOutput {
  kind: 'json';
  data: unknown;
  scope?: OutputScope;
}

export interface TableOutput {
  kind: 'table';
  columns: string[];
  rows: Array<Record<string, string>>;
  scope?: OutputScope;
}

export interface ParseFailureOutput {
  kind: 'parse-failure';
  format: OutputFormat;
  reason: string;
  rawText: string;
}

export interface DryRunOutput {
  kind: 'dry-run';
  summary: string;
  details?: Record<string, unknown>;
}

export interface ErrorOutput {
  kind: 'error';
  code: string;
  message: string;
  suggestions?: string[];
}

export type CommandOutput =
  | TextOutput
  | JsonOutput
  | TableOutput
  | ParseFailureOutput
  | DryRunOutput
  | ErrorOutput;

export type ExtractionOutcomeKind = 'structured' | 'parse-failure';

export interface ExecutionTelemetry {
  command: string;
  profile?: string;
  provider?: string;
  format?: OutputFormat;
  startedAt: string;
  finishedAt: string;
  status: 'success' | 'failure';
  outcome?: ExtractionOutcomeKind;
  promptBytes?: number;
  completionBytes?: number;
  errorCode?: string;
}

export interface CommandResult {
  exitCode: number;
  output?: CommandOutput;
  telemetry?: Partial<ExecutionTelemetry>;
  logFile?: string;
}

export type CommandHandler = (context: CliCommandContext) => Promise<CommandResult>;

export interface CommandDescriptor {
  name: string;
  summary: string;
  usage: string;
  handler: CommandHandler;
}

export interface CliApplication {
  run(argv: string[], io: ProcessIO): Promise<number>;
}

export interface CliApplicationConfig {
  name: string;
  description: string;
  router: CommandRegistry;
  auditLogger?: AuditLogger;
}

export interface CommandRegistry {
  register(descriptor: CommandDescriptor): void;
  find(name: string): CommandDescriptor | undefined;
  list(): CommandDescriptor[];
}
