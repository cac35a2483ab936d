import type { RecordRow, RecordTable } from '../usecases/extraction.types.js';

export class CsvParseError extends Error {
  /** 1-based line on which the offending record starts. */
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(message);
    this.name = 'CsvParseError';
    this.line = line;
  }
}

interface CsvRecord {
  fields: string[];
  line: number;
  quoted: boolean;
}

const DELIMITER = ',';
const QUOTE = '"';

/**
 * Splits delimited text into records. Quoted fields may span lines and use
 * `""` for a literal quote; records end at LF, CRLF or a lone CR.
 */
function readRecords(text: string): CsvRecord[] {
  const records: CsvRecord[] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let afterQuote = false;
  let quoted = false;
  let line = 1;
  let recordLine = 1;
  let quoteLine = 1;

  const endField = () => {
    fields.push(field);
    field = '';
    afterQuote = false;
  };

  const endRecord = () => {
    endField();
    records.push({ fields, line: recordLine, quoted });
    fields = [];
    quoted = false;
  };

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];

    if (inQuotes) {
      if (char === QUOTE) {
        if (text[i + 1] === QUOTE) {
          field += QUOTE;
          i += 1;
        } else {
          inQuotes = false;
          afterQuote = true;
        }
        continue;
      }
      if (char === '\n' || (char === '\r' && text[i + 1] !== '\n')) {
        line += 1;
      }
      field += char;
      continue;
    }

    if (char === '\r' || char === '\n') {
      if (char === '\r' && text[i + 1] === '\n') {
        i += 1;
      }
      endRecord();
      line += 1;
      recordLine = line;
      continue;
    }

    if (char === DELIMITER) {
      endField();
      continue;
    }

    if (afterQuote) {
      throw new CsvParseError(`Unexpected character '${char}' after closing quote on line ${line}`, line);
    }

    if (char === QUOTE && field === '') {
      inQuotes = true;
      quoted = true;
      quoteLine = line;
      continue;
    }

    field += char;
  }

  if (inQuotes) {
    throw new CsvParseError(`Unterminated quoted field starting on line ${quoteLine}`, quoteLine);
  }

  if (fields.length > 0 || field !== '' || quoted) {
    endRecord();
  }

  return records;
}

function isBlank(record: CsvRecord): boolean {
  return !record.quoted && record.fields.length === 1 && record.fields[0].trim() === '';
}

function validateHeader(header: CsvRecord): string[] {
  const seen = new Set<string>();

  header.fields.forEach((name, index) => {
    if (name.trim() === '') {
      throw new CsvParseError(`Header column ${index + 1} is empty`, header.line);
    }
    if (seen.has(name)) {
      throw new CsvParseError(`Duplicate column name '${name}' in header`, header.line);
    }
    seen.add(name);
  });

  return header.fields;
}

/**
 * Reads a comma-separated table whose first non-blank line is the header.
 * Throws `CsvParseError` for an empty input, an invalid header or any row
 * whose width differs from the header's.
 */
export function parseCsvTable(text: string): RecordTable {
  const records = readRecords(text).filter((record) => !isBlank(record));

  if (records.length === 0) {
    throw new CsvParseError('CSV input is empty: no header row found');
  }

  const [header, ...body] = records;
  const columns = validateHeader(header);

  const rows: RecordRow[] = body.map((record) => {
    if (record.fields.length !== columns.length) {
      throw new CsvParseError(
        `Row on line ${record.line} has ${record.fields.length} fields, expected ${columns.length} to match the header`,
        record.line,
      );
    }
    return Object.fromEntries(columns.map((column, index) => [column, record.fields[index]]));
  });

  return { columns, rows };
}
