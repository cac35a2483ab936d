import { renderGrid } from './resultPresenter.js';
import type { CliGlobals, CommandOutput, ProcessIO } from './types.js';

function ensureTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

export class OutputFormatter {
  private readonly io: ProcessIO;

  private readonly globals: CliGlobals;

  constructor(io: ProcessIO, globals: CliGlobals) {
    this.io = io;
    this.globals = globals;
  }

  emit(output?: CommandOutput): void {
    if (!output) {
      return;
    }

    if (this.globals.quiet && 'scope' in output && output.scope === 'info') {
      return;
    }

    switch (output.kind) {
      case 'text':
        this.io.writeStdout(ensureTrailingNewline(output.text));
        break;
      case 'json':
        this.io.writeStdout(`${JSON.stringify(output.data, null, 2)}\n`);
        break;
      case 'table':
        this.io.writeStdout(`${renderGrid(output.columns, output.rows)}\n`);
        break;
      case 'parse-failure':
        this.writeParseFailure(output.format, output.reason, output.rawText);
        break;
      case 'dry-run':
        this.writeDryRun(output.summary, output.details);
        break;
      case 'error':
        this.writeError(output.code, output.message, output.suggestions);
        break;
      default: {
        const unsupported: never = output;
        throw new Error(`Unsupported output type: ${JSON.stringify(unsupported)}`);
      }
    }
  }

  private writeParseFailure(format: string, reason: string, rawText: string): void {
    this.io.writeStderr(`Failed to parse ${format.toUpperCase()} output: ${reason}\n`);
    this.io.writeStderr('Raw model output:\n');
    this.io.writeStderr(ensureTrailingNewline(rawText));
  }

  private writeDryRun(summary: string, details?: Record<string, unknown>): void {
    const lines = [`[dry-run] ${summary}`];
    if (details) {
      lines.push(JSON.stringify(details, null, 2));
    }
    this.io.writeStdout(`${lines.join('\n')}\n`);
  }

  private writeError(code: string, message: string, suggestions?: string[]): void {
    this.io.writeStderr(`Error [${code}]: ${message}\n`);
    if (suggestions?.length) {
      for (const tip of suggestions) {
        this.io.writeStderr(`  - ${tip}\n`);
      }
    }
  }
}
