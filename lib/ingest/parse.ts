import Papa from "papaparse";
import type { RawRow } from "@/lib/domain/types";

export type ParseReport = {
  headers: string[];
  rows: RawRow[];
  errors: { row: number; message: string }[];
  rowCount: number;
};

// Header-mode CSV parse; every cell stays a string, headers are trimmed
export function parseCsvText(text: string): ParseReport {
  const result = Papa.parse<RawRow>(text, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true,
    transformHeader: (h) => h.replace(/^\uFEFF/, "").trim(),
  });

  const errors = result.errors.map((e) => ({
    // papaparse rows are 0-based over data rows; report 1-based
    row: typeof e.row === "number" ? e.row + 1 : -1,
    message: `${e.code}: ${e.message}`,
  }));

  return {
    headers: result.meta.fields ?? [],
    rows: result.data,
    errors,
    rowCount: result.data.length,
  };
}
