/**
 * CSV Storage Module
 * Persists rows of string fields in a space-delimited, double-quoted text file
 */

import fs from 'fs';

const DELIMITER = ' ';
const QUOTE = '"';
const NEEDS_QUOTING = /[ "\r\n]/;

/**
 * Parse delimited text into rows of fields.
 * A quote only opens a quoted field at the start of that field; inside
 * quotes a doubled quote is a literal one. Blank lines produce no row.
 */
export function* parseRows(content: string): Generator<string[]> {
  let currentRecord: string[] = [];
  let currentField = '';
  let inQuotes = false;
  let fieldStart = true;
  let lineHasContent = false;
  let i = 0;

  while (i < content.length) {
    const char = content[i];
    const nextChar = content[i + 1];

    if (inQuotes) {
      if (char === QUOTE) {
        if (nextChar === QUOTE) {
          currentField += QUOTE;
          i += 2;
        } else {
          inQuotes = false;
          i++;
        }
        continue;
      }
      currentField += char;
      i++;
      continue;
    }

    if (char === QUOTE && fieldStart) {
      inQuotes = true;
      fieldStart = false;
      lineHasContent = true;
      i++;
      continue;
    }

    if (char === DELIMITER) {
      currentRecord.push(currentField);
      currentField = '';
      fieldStart = true;
      lineHasContent = true;
      i++;
      continue;
    }

    if (char === '\n' || char === '\r') {
      if (lineHasContent) {
        currentRecord.push(currentField);
        yield currentRecord;
      }
      currentRecord = [];
      currentField = '';
      fieldStart = true;
      lineHasContent = false;
      i += char === '\r' && nextChar === '\n' ? 2 : 1;
      continue;
    }

    currentField += char;
    fieldStart = false;
    lineHasContent = true;
    i++;
  }

  // Last line without a terminator
  if (lineHasContent) {
    currentRecord.push(currentField);
    yield currentRecord;
  }
}

function encodeField(field: string): string {
  if (!NEEDS_QUOTING.test(field)) return field;
  return QUOTE + field.split(QUOTE).join(QUOTE + QUOTE) + QUOTE;
}

/**
 * Encode one row as a line, including the trailing newline
 */
export function encodeRow(fields: readonly string[]): string {
  return fields.map(encodeField).join(DELIMITER) + '\n';
}

export class CsvStorage {
  readonly filename: string;

  constructor(filename: string) {
    this.filename = filename;
  }

  /**
   * Rows stored in the file; nothing when the file does not exist
   */
  *load(): Generator<string[]> {
    if (!fs.existsSync(this.filename)) return;
    const content = fs.readFileSync(this.filename, 'utf-8');
    yield* parseRows(content);
  }

  /**
   * Replace the file with the given rows. Not atomic.
   */
  save(rows: Iterable<readonly string[]>): void {
    let content = '';
    for (const row of rows) {
      content += encodeRow(row);
    }
    fs.writeFileSync(this.filename, content);
  }
}
