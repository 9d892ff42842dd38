export type CsvLine = {
  text: string;
  lineNumber: number;
};

const DELIMITER = ',';
const QUOTE = '"';

/**
 * Splits one line on commas. A double quote flips the quoted state for the
 * rest of the scan and is not copied into the field, so `a,"b,c",d` yields
 * `['a', 'b,c', 'd']`. Fields are trimmed.
 */
export function parseCsvLine(line: string): string[] {
  const values: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const ch of line) {
    if (ch === QUOTE) {
      inQuotes = !inQuotes;
      continue;
    }
    if (ch === DELIMITER && !inQuotes) {
      values.push(current.trim());
      current = '';
      continue;
    }
    current += ch;
  }

  values.push(current.trim());
  return values;
}

/**
 * Non-empty lines of `text`, trimmed, with their 1-based position in the file.
 */
export function splitCsvLines(text: string): CsvLine[] {
  const sanitized = text.replace(/^\uFEFF/, '');
  const lines: CsvLine[] = [];
  sanitized.split('\n').forEach((raw, idx) => {
    const trimmed = raw.trim();
    if (trimmed) {
      lines.push({ text: trimmed, lineNumber: idx + 1 });
    }
  });
  return lines;
}

export function normalizeHeaderLabel(header: string): string {
  return header.trim().toLowerCase();
}
