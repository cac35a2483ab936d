import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { ExecutionTelemetry } from './types.js';

export interface AuditLoggerOptions {
  /** Overwrite the file on each run instead of appending. */
  append?: boolean;
}

/**
 * Writes one JSON line of telemetry per command run. Fields without a value
 * are left out of the line.
 */
export class AuditLogger {
  private readonly append: boolean;

  constructor(options: AuditLoggerOptions = {}) {
    this.append = options.append ?? true;
  }

  async record(entry: ExecutionTelemetry, filePath?: string): Promise<void> {
    if (!filePath) {
      return;
    }

    const line = `${JSON.stringify(entry)}\n`;

    await mkdir(dirname(filePath), { recursive: true });

    if (this.append) {
      await appendFile(filePath, line, 'utf-8');
    } else {
      await writeFile(filePath, line, 'utf-8');
    }
  }
}
