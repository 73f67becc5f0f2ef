export type CsvValue = string | number | null;

const NEEDS_QUOTING = /[",\r\n]/;

export function csvCell(value: CsvValue): string {
  if (value === null) return "";
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Serialize rows as RFC 4180 CSV with a header line. Every line, including the
 * last, ends in CRLF.
 */
export function toCsv<C extends string>(
  columns: readonly C[],
  rows: ReadonlyArray<Record<C, CsvValue>>,
): string {
  const lines = [columns.map(csvCell).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => csvCell(row[column])).join(","));
  }
  return lines.map((line) => `${line}\r\n`).join("");
}
