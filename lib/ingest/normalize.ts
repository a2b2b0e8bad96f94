import type { HousekeepingRow, RawRow, RoomUsageRow, TableKind } from "@/lib/domain/types";
import { anonymizeName, normalizeHeaderKey } from "./aliases";
import { parseLogDate } from "./dates";
import { SchemaError } from "./errors";
import type { ParseReport } from "./parse";
import { ALIASES, HousekeepingCsvSchema, REQUIRED_COLUMNS, RoomUsageCsvSchema } from "./schemas";

export type NormalizeOptions = {
  anonymize?: boolean;
};

const NAME_FIELDS = ["housekeeper_before", "housekeeper_after", "username"] as const;

// Every missing required column is reported, not just the first
export function missingColumns(kind: TableKind, headers: string[]): string[] {
  const aliases = ALIASES[kind];
  const present = new Set<string>();
  for (const h of headers) {
    const key = aliases[normalizeHeaderKey(h)];
    if (key) present.add(key);
  }
  return REQUIRED_COLUMNS[kind].filter((col) => {
    const key = aliases[normalizeHeaderKey(col)];
    return !key || !present.has(key);
  });
}

export function validateColumns(kind: TableKind, headers: string[]): void {
  const missing = missingColumns(kind, headers);
  if (missing.length > 0) throw new SchemaError(kind, missing);
}

// Map aliased headers → canonical keys; unknown columns are ignored
function mapRow(raw: RawRow, aliases: Record<string, string>): Record<string, unknown> {
  const mapped: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(raw)) {
    const target = aliases[normalizeHeaderKey(key)];
    if (!target || target in mapped) continue;
    mapped[target] = val;
  }
  return mapped;
}

export function normalizeHousekeeping(
  table: ParseReport,
  options: NormalizeOptions = {}
): HousekeepingRow[] {
  validateColumns("housekeeping", table.headers);
  return table.rows.map((raw) => {
    const mapped = mapRow(raw, ALIASES.housekeeping);
    if (options.anonymize) {
      for (const field of NAME_FIELDS) {
        const v = mapped[field];
        mapped[field] = anonymizeName(typeof v === "string" ? v : "");
      }
    }
    const r = HousekeepingCsvSchema.parse(mapped);
    return {
      room_number: r.room_number,
      room_type: r.room_type,
      fd_status: r.fd_status,
      hsk_before: r.hsk_before,
      hsk_after: r.hsk_after,
      housekeeper_before: r.housekeeper_before,
      housekeeper_after: r.housekeeper_after,
      username: r.username,
      date_raw: r.date,
      timestamp: parseLogDate(r.date),
    };
  });
}

export function normalizeRoomUsage(table: ParseReport): RoomUsageRow[] {
  validateColumns("room_usage", table.headers);
  return table.rows.map((raw) => {
    const r = RoomUsageCsvSchema.parse(mapRow(raw, ALIASES.room_usage));
    return {
      room_number: r.room_number,
      room_type: r.room_type,
      nights_raw: r.nights,
      features_raw: r.features,
    };
  });
}
