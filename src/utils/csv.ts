/**
 * Minimal RFC 4180 CSV helpers
 *
 * Tracker exports quote any cell holding commas or line breaks (the Issues
 * column almost always does), so a plain split(',') is not enough here.
 */

/**
 * Parse CSV text into rows of raw cell strings.
 *
 * Handles quoted cells, doubled quotes, embedded newlines, CRLF line
 * endings and a leading BOM. Blank lines are skipped.
 */
export function parseCsv(content: string): string[][] {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const rows: string[][] = [];

  let row: string[] = [];
  let cell = '';
  let inQuotes = false;
  let i = 0;

  const endRow = () => {
    row.push(cell);
    if (!(row.length === 1 && row[0] === '')) {
      rows.push(row);
    }
    row = [];
    cell = '';
  };

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        cell += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && cell === '') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(cell);
      cell = '';
    } else if (ch === '\r') {
      if (text[i + 1] === '\n') i++;
      endRow();
    } else if (ch === '\n') {
      endRow();
    } else {
      cell += ch;
    }
    i++;
  }

  if (inQuotes) {
    throw new Error('Malformed CSV: unterminated quoted field');
  }

  if (cell !== '' || row.length > 0) {
    endRow();
  }

  return rows;
}

/**
 * Quote a cell if it contains a delimiter, quote or line break
 */
export function formatCsvCell(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Render rows as CSV text, one line per row, with a trailing newline
 */
export function formatCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => row.map(formatCsvCell).join(',')).join('\n') + '\n';
}
