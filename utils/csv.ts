import { ParseError } from '../src/store/errors.js';

export type CsvTable = {
  headers: string[];
  rows: Record<string, string>[];
};

type CsvCell = string | number | null | undefined;

/**
 * Parses RFC 4180 style CSV. The first non-blank line is the header; quoted
 * fields may hold commas, doubled quotes and line breaks. Blank lines are skipped.
 */
export function parseCSV(text: string): CsvTable {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const lines: string[][] = [];

  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let closedQuote = false;
  let line = 1;

  const endRow = () => {
    row.push(field);
    // a lone empty unquoted cell is a blank line
    if (!(row.length === 1 && row[0] === '' && !closedQuote)) lines.push(row);
    row = [];
    field = '';
    closedQuote = false;
  };

  for (let i = 0; i < input.length; i++) {
    const c = input[i];

    if (inQuotes) {
      if (c === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
          closedQuote = true;
        }
      } else {
        if (c === '\n') line++;
        field += c;
      }
      continue;
    }

    if (c === ',') {
      row.push(field);
      field = '';
      closedQuote = false;
    } else if (c === '\n' || c === '\r') {
      if (c === '\r' && input[i + 1] === '\n') i++;
      endRow();
      line++;
    } else if (closedQuote) {
      throw new ParseError(`Unexpected character after closing quote on line ${line}`);
    } else if (c === '"') {
      if (field !== '') throw new ParseError(`Unexpected quote inside unquoted field on line ${line}`);
      inQuotes = true;
    } else {
      field += c;
    }
  }

  if (inQuotes) throw new ParseError(`Unterminated quoted field starting before line ${line}`);
  if (field !== '' || row.length > 0 || closedQuote) endRow();

  if (lines.length === 0) throw new ParseError('No columns to parse from file');

  const headers = lines[0].map(h => h.trim());
  const seen = new Set<string>();
  for (const h of headers) {
    if (h === '') throw new ParseError('Header row contains an empty column name');
    if (seen.has(h)) throw new ParseError(`Duplicate column "${h}" in header`);
    seen.add(h);
  }

  const rows = lines.slice(1).map((cells, index) => {
    if (cells.length > headers.length) {
      throw new ParseError(`Expected ${headers.length} fields in row ${index + 1}, saw ${cells.length}`);
    }
    const record: Record<string, string> = {};
    headers.forEach((h, col) => {
      record[h] = cells[col] ?? '';
    });
    return record;
  });

  return { headers, rows };
}

const escapeCell = (value: CsvCell): string => {
  if (value === null || value === undefined) return '';
  const stringValue = String(value);
  if (/[",\r\n]/.test(stringValue)) return `"${stringValue.replace(/"/g, '""')}"`;
  return stringValue;
};

export function toCSV(headers: readonly string[], data: ReadonlyArray<Record<string, CsvCell>>): string {
  return [
    headers.map(escapeCell).join(','),
    ...data.map(row => headers.map(header => escapeCell(row[header])).join(',')),
  ].join('\n');
}
