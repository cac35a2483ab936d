import type { ExtractionResult } from '@struct-extract/core';

import type { CommandOutput } from './types.js';

function displayCell(value: string): string {
  return value.replace(/\r?\n/g, '\\n');
}

/**
 * Renders rows as an aligned text grid: header, separator, one line per row.
 */
export function renderGrid(columns: string[], rows: Array<Record<string, string>>): string {
  const cells = rows.map((row) => columns.map((column) => displayCell(row[column] ?? '')));
  const header = columns.map(displayCell);
  const widths = cells.reduce(
    (current, line) => current.map((width, index) => Math.max(width, line[index].length)),
    header.map((name) => name.length),
  );

  const formatLine = (values: string[]) =>
    values
      .map((value, index) => value.padEnd(widths[index], ' '))
      .join(' | ')
      .trimEnd();

  const lines = [formatLine(header), widths.map((width) => '-'.repeat(width)).join('-+-')];

  for (const line of cells) {
    lines.push(formatLine(line));
  }

  if (cells.length === 0) {
    lines.push('(0 rows)');
  }

  return lines.join('\n');
}

export function presentResult(result: ExtractionResult): CommandOutput {
  if (result.kind === 'parse-failure') {
    return {
      kind: 'parse-failure',
      format: result.format,
      reason: result.reason,
      rawText: result.rawText,
    };
  }

  switch (result.format) {
    case 'json':
      return { kind: 'json', data: result.value };
    case 'csv':
      return { kind: 'table', columns: result.table.columns, rows: result.table.rows };
    default: {
      const unreachable: never = result;
      throw new Error(`Unsupported result: ${JSON.stringify(unreachable)}`);
    }
  }
}
