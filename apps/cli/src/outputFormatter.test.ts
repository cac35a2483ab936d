import assert from 'node:assert/strict';
import test from 'node:test';

import { OutputFormatter } from './outputFormatter.js';
import type { CommandOutput, ProcessIO } from './types.js';

function createIO() {
  const stdout: string[] = [];
  const stderr: string[] = [];

  const io: ProcessIO = {
    writeStdout: (message: string) => stdout.push(message),
    writeStderr: (message: string) => stderr.push(message),
    setExitCode: () => {},
    isStdinInteractive: () => false,
  };

  return { io, stdout, stderr };
}

function emit(output: CommandOutput, options = { quiet: false, dryRun: false }) {
  const { io, stdout, stderr } = createIO();
  const formatter = new OutputFormatter(io, options);
  formatter.emit(output);
  return { stdout, stderr };
}

test('suppresses informational text when quiet mode is enabled', () => {
  const { stdout } = emit(
    { kind: 'text', text: 'info message', scope: 'info' },
    { quiet: true, dryRun: false },
  );
  assert.equal(stdout.length, 0);
});

test('quiet mode still prints extracted data', () => {
  const { stdout } = emit({ kind: 'json', data: { ok: true } }, { quiet: true, dryRun: false });
  assert.deepEqual(stdout, ['{\n  "ok": true\n}\n']);
});

test('prints JSON payload indented with a trailing newline', () => {
  const { stdout } = emit({ kind: 'json', data: { name: 'Alice', tags: ['a'] } });
  assert.deepEqual(stdout, ['{\n  "name": "Alice",\n  "tags": [\n    "a"\n  ]\n}\n']);
});

test('prints tables as an aligned grid', () => {
  const { stdout, stderr } = emit({
    kind: 'table',
    columns: ['id', 'name'],
    rows: [
      { id: '1', name: 'Widget' },
      { id: '22', name: 'Gear' },
    ],
  });

  assert.deepEqual(stderr, []);
  assert.deepEqual(stdout, ['id | name\n---+-------\n1  | Widget\n22 | Gear\n']);
});

test('writes parse failures to stderr with the raw model output', () => {
  const { stdout, stderr } = emit({
    kind: 'parse-failure',
    format: 'csv',
    reason: 'CSV input is empty: no header row found',
    rawText: '   ',
  });

  assert.deepEqual(stdout, []);
  assert.deepEqual(stderr, [
    'Failed to parse CSV output: CSV input is empty: no header row found\n',
    'Raw model output:\n',
    '   \n',
  ]);
});

test('prints structured error output with suggestions', () => {
  const { stderr } = emit({
    kind: 'error',
    code: 'E_TIMEOUT',
    message: 'Timed out',
    suggestions: ['Retry later'],
  });
  assert.deepEqual(stderr, ['Error [E_TIMEOUT]: Timed out\n', '  - Retry later\n']);
});
