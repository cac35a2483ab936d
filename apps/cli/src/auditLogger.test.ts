import { mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { rm } from 'node:fs/promises';
import test from 'node:test';

import assert from 'node:assert/strict';

import { AuditLogger } from './auditLogger.js';
import type { ExecutionTelemetry } from './types.js';

function createTempFile(): string {
  const dir = mkdtempSync(join(tmpdir(), 'struct-extract-audit-'));
  return join(dir, 'logs', 'audit.log');
}

function entry(command: string): ExecutionTelemetry {
  return {
    command,
    profile: 'default',
    provider: 'openai',
    format: 'csv',
    startedAt: '2024-05-01T10:00:00.000Z',
    finishedAt: '2024-05-01T10:00:01.000Z',
    status: 'success',
    outcome: 'structured',
    promptBytes: 120,
    completionBytes: 48,
  };
}

test('AuditLogger appends telemetry entries to a JSONL file', async () => {
  const filePath = createTempFile();
  const logger = new AuditLogger();

  await logger.record(entry('extract'), filePath);
  await logger.record(entry('config'), filePath);

  const lines = readFileSync(filePath, 'utf-8').trim().split('\n');
  assert.deepEqual(lines, [JSON.stringify(entry('extract')), JSON.stringify(entry('config'))]);

  await rm(dirname(dirname(filePath)), { recursive: true, force: true });
});

test('AuditLogger overwrites the file when append is disabled', async () => {
  const filePath = createTempFile();
  const logger = new AuditLogger({ append: false });

  await logger.record(entry('extract'), filePath);
  await logger.record(entry('config'), filePath);

  assert.equal(readFileSync(filePath, 'utf-8'), `${JSON.stringify(entry('config'))}\n`);

  await rm(dirname(dirname(filePath)), { recursive: true, force: true });
});

test('AuditLogger does nothing without a file path', async () => {
  await new AuditLogger().record(entry('extract'));
});
