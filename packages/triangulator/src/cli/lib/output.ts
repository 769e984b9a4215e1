/**
 * Output Formatting for CLI Commands
 *
 * Supports: table, json, ndjson, csv formats
 *
 * @module cli/lib/output
 */

/**
 * Output format options
 */
export const OUTPUT_FORMATS = ['table', 'json', 'ndjson', 'csv'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Column definition for table and csv output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

function cellText(row: Record<string, unknown>, column: TableColumn): string {
  const value = row[column.key];
  return column.formatter ? column.formatter(value) : String(value ?? '');
}

/**
 * Format rows as an aligned text table
 */
export function formatTable(data: readonly Record<string, unknown>[], columns: readonly TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((column) =>
    Math.max(column.header.length, ...data.map((row) => cellText(row, column).length))
  );

  const pad = (text: string, index: number): string =>
    columns[index].align === 'right' ? text.padStart(widths[index]) : text.padEnd(widths[index]);

  const headerRow = columns.map((column, i) => pad(column.header, i)).join(' | ');
  const separator = widths.map((width) => '-'.repeat(width)).join('-+-');
  const dataRows = data.map((row) => columns.map((column, i) => pad(cellText(row, column), i)).join(' | '));

  return [headerRow, separator, ...dataRows].map((line) => line.trimEnd()).join('\n');
}

/**
 * Format data as pretty-printed JSON
 */
export function formatJson<T>(data: T): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Format rows as NDJSON (one JSON object per line)
 */
export function formatNdjson<T>(data: readonly T[]): string {
  return data.map((item) => JSON.stringify(item)).join('\n');
}

/**
 * Escape a value for CSV output
 */
function escapeCsv(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Format rows as CSV with a header line
 */
export function formatCsv(data: readonly Record<string, unknown>[], columns: readonly TableColumn[]): string {
  const headerRow = columns.map((column) => escapeCsv(column.header)).join(',');
  const dataRows = data.map((row) => columns.map((column) => escapeCsv(cellText(row, column))).join(','));
  return [headerRow, ...dataRows].join('\n');
}

/**
 * Format rows in the requested format
 */
export function formatOutput(
  data: readonly Record<string, unknown>[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'ndjson':
      return formatNdjson(data);
    case 'csv':
      return formatCsv(data, columns);
    case 'table':
      return formatTable(data, columns);
  }
}

/**
 * Common column formatters
 */
export const formatters = {
  /**
   * Kilometres with one decimal; infinite errors print as "inf"
   */
  km: (value: unknown): string => {
    if (value === null || value === undefined) return '-';
    if (value === 'Infinity' || value === Infinity) return 'inf';
    const num = Number(value);
    return Number.isNaN(num) ? String(value) : num.toFixed(1);
  },

  /**
   * Signed decimal degrees with two decimals
   */
  degrees: (value: unknown): string => {
    const num = Number(value);
    return Number.isNaN(num) ? String(value ?? '-') : num.toFixed(2);
  },

  /**
   * Dash for missing values
   */
  orDash: (value: unknown): string => {
    return value === null || value === undefined || value === '' ? '-' : String(value);
  },
};

/**
 * JSON has no Infinity; emit it as a string instead of null
 */
export function jsonSafeNumber(value: number): number | string {
  return Number.isFinite(value) ? value : String(value);
}

/**
 * Print command output to stdout
 */
export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}
