import type { HousekeepingFact, RotationQuality, RotationRecord } from "@/lib/domain/types";
import { compareText, round } from "./aggregate";
import type { ReportConfig, RotationBands } from "./config";

// Lower edge inclusive, upper edge exclusive; top band is closed at 1.0
export function classifyRotation(rate: number, bands: RotationBands): RotationQuality {
  if (rate < bands.low) return "Very Low";
  if (rate < bands.moderate) return "Low";
  if (rate < bands.high) return "Moderate";
  return "High";
}

export function uniquenessRate(uniqueRooms: number, totalActions: number): number {
  return totalActions > 0 ? uniqueRooms / totalActions : 0;
}

// 1 − Herfindahl index of the visit distribution
export function herfindahlRandomness(visits: Iterable<number>): number {
  const counts = Array.from(visits);
  const total = counts.reduce((s, v) => s + v, 0);
  if (total <= 0) return 0;
  let hhi = 0;
  for (const v of counts) {
    const share = v / total;
    hhi += share * share;
  }
  return Math.min(1, Math.max(0, 1 - hhi));
}

// Dense rank, highest value = 1, equal values share a rank
export function denseRankDescending(values: readonly number[]): number[] {
  const distinct = Array.from(new Set(values)).sort((a, b) => b - a);
  const rankOf = new Map(distinct.map((v, i) => [v, i + 1] as const));
  return values.map((v) => rankOf.get(v) ?? distinct.length + 1);
}

// Worst rotation with real volume first
export function compareRotation(a: RotationRecord, b: RotationRecord): number {
  return (
    a.room_uniqueness_rate - b.room_uniqueness_rate ||
    b.total_actions - a.total_actions ||
    compareText(a.username, b.username)
  );
}

type UserAcc = { actions: number; changes: number; visits: Map<string, number> };

export function scoreRotation(
  facts: readonly HousekeepingFact[],
  config: Pick<ReportConfig, "bands">
): RotationRecord[] {
  const users = new Map<string, UserAcc>();
  for (const f of facts) {
    let u = users.get(f.username);
    if (!u) {
      u = { actions: 0, changes: 0, visits: new Map() };
      users.set(f.username, u);
    }
    u.actions += 1;
    if (f.changed) u.changes += 1;
    u.visits.set(f.room_number, (u.visits.get(f.room_number) ?? 0) + 1);
  }

  const scored = Array.from(users, ([username, u]) => {
    const rate = uniquenessRate(u.visits.size, u.actions);
    return {
      username,
      total_actions: u.actions,
      unique_rooms: u.visits.size,
      status_changes: u.changes,
      room_uniqueness_rate: round(rate, 3),
      rotation_quality: classifyRotation(rate, config.bands),
      room_randomness: round(herfindahlRandomness(u.visits.values()), 4),
    };
  });

  const ranks = denseRankDescending(scored.map((s) => s.room_randomness));
  return scored
    .map((s, i) => ({ ...s, room_randomness_rank: ranks[i] }))
    .sort(compareRotation);
}

// Users below the volume floor are never flagged
export function rotationCallouts(
  records: readonly RotationRecord[],
  config: Pick<ReportConfig, "calloutMinActions" | "calloutLimit">
): RotationRecord[] {
  return records
    .filter((r) => r.total_actions >= config.calloutMinActions)
    .sort(compareRotation)
    .slice(0, config.calloutLimit);
}
