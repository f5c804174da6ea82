/**
 * Output rendering for records
 */

import type { CatalogRecord } from "@service-catalog/store";

const TABLE_COLUMNS = ["name", "category", "description"] as const;

/**
 * Render JSON for stdout, pretty unless raw
 */
export function renderJson(data: unknown, options?: { raw?: boolean }): string {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  return json + "\n";
}

/**
 * Render records as aligned columns with an upper-case header row.
 * The last column is not padded.
 */
export function renderTable(records: readonly CatalogRecord[]): string {
  const rows: string[][] = [
    TABLE_COLUMNS.map((column) => column.toUpperCase()),
    ...records.map((record) => TABLE_COLUMNS.map((column) => record[column])),
  ];

  const widths = TABLE_COLUMNS.map((_, index) =>
    Math.max(...rows.map((row) => (row[index] ?? "").length))
  );

  return rows
    .map((row) =>
      row
        .map((cell, index) => (index === row.length - 1 ? cell : cell.padEnd(widths[index] ?? 0)))
        .join("  ")
    )
    .join("\n") + "\n";
}

/**
 * Wrap text in red when the stream is a terminal
 */
export function colorizeError(
  text: string,
  stream: { isTTY?: boolean } = process.stderr
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }
  return `\x1b[31m${text}\x1b[0m`;
}
