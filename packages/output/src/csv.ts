export type CsvValue = string | number | null | undefined;

export interface CsvOptions {
  /** Field delimiter (default: ',') */
  delimiter?: string;
}

/** A rendered report file, ready to be written under its analysis directory. */
export interface CsvFile {
  filename: string;
  content: string;
}

/**
 * Escape a value for CSV (handles quotes and delimiters)
 */
export function escapeCsvValue(value: CsvValue, delimiter: string): string {
  if (value === null || value === undefined) {
    return '';
  }

  const str = String(value);

  const needsQuoting = str.includes(delimiter) ||
                       str.includes('"') ||
                       str.includes('\n') ||
                       str.includes('\r');

  if (needsQuoting) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

export function rowToCsvLine(row: readonly CsvValue[], delimiter: string): string {
  return row.map(value => escapeCsvValue(value, delimiter)).join(delimiter);
}

/**
 * Renders a header row and data rows; the content ends with a newline.
 */
export function renderCsv(
  header: readonly string[],
  rows: readonly (readonly CsvValue[])[],
  options: CsvOptions = {}
): string {
  const delimiter = options.delimiter ?? ',';
  const lines = [rowToCsvLine(header, delimiter), ...rows.map(row => rowToCsvLine(row, delimiter))];
  return `${lines.join('\n')}\n`;
}
