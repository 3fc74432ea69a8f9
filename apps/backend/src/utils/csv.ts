/**
 * Minimal CSV writer for exports. Fields containing the delimiter, a quote
 * or a line break are quoted, with embedded quotes doubled.
 */

export type CsvValue = string | number | boolean | null | undefined;

export function escapeCsvValue(value: CsvValue): string {
  const stringValue = value == null ? '' : String(value);
  const needsQuoting = /[",\r\n]/.test(stringValue);
  return needsQuoting ? `"${stringValue.replace(/"/g, '""')}"` : stringValue;
}

export function toCsvRow(values: ReadonlyArray<CsvValue>): string {
  return values.map(escapeCsvValue).join(',');
}

/** Header plus rows, each line terminated by a newline */
export function toCsv(
  header: ReadonlyArray<string>,
  rows: ReadonlyArray<ReadonlyArray<CsvValue>>,
): string {
  return [header, ...rows].map((row) => `${toCsvRow(row)}\n`).join('');
}

/** Format an ISO timestamp as `YYYY-MM-DD HH:mm:ss` in UTC */
export function formatCsvTimestamp(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;
  return date.toISOString().slice(0, 19).replace('T', ' ');
}
