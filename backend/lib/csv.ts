/**
 * Minimal CSV writer for exporting detection records.
 *
 * Header row is the union of all fields in order of first appearance.
 * Cells holding a comma, a quote or a line break are quoted with inner
 * quotes doubled; rows end with `\n`.
 */

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Collect the column names of a batch of records in order of first appearance
 */
export function collectColumns(records: ReadonlyArray<Record<string, unknown>>): string[] {
  const columns = new Set<string>();
  for (const record of records) {
    for (const field of Object.keys(record)) {
      columns.add(field);
    }
  }
  return [...columns];
}

/**
 * Serialize records to a CSV document with a header row
 */
export function toCsv(records: ReadonlyArray<Record<string, unknown>>): string {
  const columns = collectColumns(records);
  const lines = [
    columns.map(escapeCell).join(','),
    ...records.map(record =>
      columns.map(column => escapeCell(toCellText(record[column]))).join(',')
    ),
  ];
  return lines.map(line => `${line}\n`).join('');
}

/**
 * Render a single attribute value as cell text
 *
 * DynamoDB sets arrive as `Set` instances and binary attributes as
 * `Uint8Array`; both are given a stable textual form.
 */
export function toCellText(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Set) {
    return JSON.stringify([...value]);
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('base64');
  }
  return JSON.stringify(value);
}

function escapeCell(text: string): string {
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}
