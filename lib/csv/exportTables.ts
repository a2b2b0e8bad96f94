import type { Cell, DataTable } from "@/lib/report/tables";

/**
 * Serializes a table to CSV text (header row first, "\n" line endings,
 * trailing newline). Output depends only on the table, so identical
 * inputs give byte-identical files.
 */
export function tableToCsv(table: DataTable): string {
  const csvRows: string[] = [];

  // Add header row
  csvRows.push(table.headers.map(escapeCSVField).join(","));

  // Add data rows
  for (const row of table.rows) {
    csvRows.push(row.map((v) => escapeCSVField(formatCSVValue(v))).join(","));
  }

  return csvRows.join("\n") + "\n";
}

/**
 * Formats a value for CSV export
 */
export function formatCSVValue(value: Cell | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }

  if (typeof value === "number") {
    return Number.isFinite(value) ? value.toString() : "";
  }

  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }

  return String(value);
}

/**
 * Escapes a field value for CSV format
 */
export function escapeCSVField(value: string): string {
  if (!value) return "";

  // If the value contains comma, quote, or a line break, wrap in quotes and escape quotes
  if (value.includes(",") || value.includes('"') || value.includes("\n") || value.includes("\r")) {
    return `"${value.replace(/"/g, '""')}"`;
  }

  return value;
}
