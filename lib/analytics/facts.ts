import type {
  FeatureFact,
  HousekeepingFact,
  HousekeepingRow,
  RoomUsageFact,
  RoomUsageRow,
} from "@/lib/domain/types";
import { splitFeatures } from "@/lib/ingest/aliases";
import { toDayKey } from "@/lib/ingest/dates";

export function transitionLabel(before: string, after: string): string {
  return `${before} → ${after}`;
}

// 1:1 with input, order preserved
export function deriveHousekeepingFacts(rows: readonly HousekeepingRow[]): HousekeepingFact[] {
  return rows.map((r) => ({
    ...r,
    changed: r.hsk_before !== r.hsk_after,
    transition: transitionLabel(r.hsk_before, r.hsk_after),
    day: toDayKey(r.timestamp),
  }));
}

export function dateParseSuccessRate(facts: readonly HousekeepingFact[]): number {
  if (facts.length === 0) return 0;
  const parsed = facts.filter((f) => f.day !== null).length;
  return parsed / facts.length;
}

// Plain decimal only: Number() would also take "0x10", "0b11" and "1e3"
const DECIMAL = /^(\d+(\.\d*)?|\.\d+)$/;

// Non-negative finite number; anything else counts as 0 nights
export function coerceNights(value: string | number | null | undefined): number {
  if (value === null || value === undefined) return 0;
  const s = String(value).trim().replace(/,/g, "");
  if (!DECIMAL.test(s)) return 0;
  const n = Number(s);
  return Number.isFinite(n) && n > 0 ? n : 0;
}

export function deriveRoomUsageFacts(rows: readonly RoomUsageRow[]): RoomUsageFact[] {
  return rows.map((r) => ({
    ...r,
    nights: coerceNights(r.nights_raw),
    features: splitFeatures(r.features_raw),
  }));
}

export function expandFeatures(facts: readonly RoomUsageFact[]): FeatureFact[] {
  return facts.flatMap((f) =>
    f.features.map((feature) => ({ feature, nights: f.nights, room_number: f.room_number }))
  );
}
