import type {
  AggregateGroup,
  FeatureFact,
  FeatureUsage,
  HousekeepingFact,
  RoomNights,
  RoomTypeUsage,
  RoomUsageFact,
  TransitionMatrix,
} from "@/lib/domain/types";

export function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

// Code-unit order; independent of locale
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function topN<T>(view: readonly T[], n: number): T[] {
  const k = Number.isFinite(n) ? Math.max(1, Math.floor(n)) : 1;
  return view.slice(0, k);
}

type GroupAcc = { rows: number; rooms: Set<string>; changed: number };

// Folds facts into groups, first-appearance order
function groupFacts(
  facts: readonly HousekeepingFact[],
  keyOf: (f: HousekeepingFact) => string | null
): AggregateGroup[] {
  const groups = new Map<string | null, GroupAcc>();
  for (const f of facts) {
    const key = keyOf(f);
    let g = groups.get(key);
    if (!g) {
      g = { rows: 0, rooms: new Set(), changed: 0 };
      groups.set(key, g);
    }
    g.rows += 1;
    g.rooms.add(f.room_number);
    if (f.changed) g.changed += 1;
  }
  return Array.from(groups, ([key, g]) => ({
    key,
    rows: g.rows,
    unique_rooms: g.rooms.size,
    changed: g.changed,
    change_rate: g.rows > 0 ? round(g.changed / g.rows, 4) : 0,
  }));
}

const byChangedThenRows = (a: AggregateGroup, b: AggregateGroup) =>
  b.changed - a.changed || b.rows - a.rows;

const byRowsThenChanged = (a: AggregateGroup, b: AggregateGroup) =>
  b.rows - a.rows || b.changed - a.changed;

// Chronological; rows whose date failed to parse form a trailing null-day group
export function groupByDay(facts: readonly HousekeepingFact[]): AggregateGroup[] {
  return groupFacts(facts, (f) => f.day).sort((a, b) => {
    if (a.key === null) return b.key === null ? 0 : 1;
    if (b.key === null) return -1;
    return compareText(a.key, b.key);
  });
}

export function groupByRoomType(facts: readonly HousekeepingFact[]): AggregateGroup[] {
  return groupFacts(facts, (f) => f.room_type).sort(byChangedThenRows);
}

// "Closing" housekeeper = Housekeeper After
export function groupByClosingHousekeeper(facts: readonly HousekeepingFact[]): AggregateGroup[] {
  return groupFacts(facts, (f) => f.housekeeper_after).sort(byChangedThenRows);
}

export function groupByUsername(facts: readonly HousekeepingFact[]): AggregateGroup[] {
  return groupFacts(facts, (f) => f.username).sort(byRowsThenChanged);
}

export function transitionMatrix(facts: readonly HousekeepingFact[]): TransitionMatrix {
  const pairs = new Map<string, Map<string, number>>();
  const afterSet = new Set<string>();
  for (const f of facts) {
    let row = pairs.get(f.hsk_before);
    if (!row) {
      row = new Map();
      pairs.set(f.hsk_before, row);
    }
    row.set(f.hsk_after, (row.get(f.hsk_after) ?? 0) + 1);
    afterSet.add(f.hsk_after);
  }
  const before = Array.from(pairs.keys()).sort(compareText);
  const after = Array.from(afterSet).sort(compareText);
  const counts = before.map((b) => after.map((a) => pairs.get(b)?.get(a) ?? 0));
  return { before, after, counts };
}

// Most frequent real (Before ≠ After) transition; ties keep first appearance
export function topTransition(
  facts: readonly HousekeepingFact[]
): { transition: string; count: number } | null {
  const counts = new Map<string, number>();
  for (const f of facts) {
    if (!f.changed) continue;
    counts.set(f.transition, (counts.get(f.transition) ?? 0) + 1);
  }
  let best: { transition: string; count: number } | null = null;
  for (const [transition, count] of counts) {
    if (!best || count > best.count) best = { transition, count };
  }
  return best;
}

// ================= ROOM USAGE =================

export function usageByRoomType(facts: readonly RoomUsageFact[]): RoomTypeUsage[] {
  const groups = new Map<string, { rooms: Set<string>; nights: number }>();
  for (const f of facts) {
    let g = groups.get(f.room_type);
    if (!g) {
      g = { rooms: new Set(), nights: 0 };
      groups.set(f.room_type, g);
    }
    g.rooms.add(f.room_number);
    g.nights += f.nights;
  }
  return Array.from(groups, ([room_type, g]) => ({
    room_type,
    rooms: g.rooms.size,
    total_nights: round(g.nights, 2),
    avg_nights_per_room: g.rooms.size > 0 ? round(g.nights / g.rooms.size, 2) : 0,
  })).sort((a, b) => b.total_nights - a.total_nights || b.rooms - a.rooms);
}

export function usageByFeature(features: readonly FeatureFact[]): FeatureUsage[] {
  const groups = new Map<string, { mentions: number; rooms: Set<string>; nights: number }>();
  for (const f of features) {
    let g = groups.get(f.feature);
    if (!g) {
      g = { mentions: 0, rooms: new Set(), nights: 0 };
      groups.set(f.feature, g);
    }
    g.mentions += 1;
    g.rooms.add(f.room_number);
    g.nights += f.nights;
  }
  return Array.from(groups, ([feature, g]) => ({
    feature,
    mentions: g.mentions,
    rooms: g.rooms.size,
    total_nights: round(g.nights, 2),
    avg_nights_per_room: g.rooms.size > 0 ? round(g.nights / g.rooms.size, 2) : 0,
  })).sort((a, b) => b.total_nights - a.total_nights || b.mentions - a.mentions);
}

// Per-room totals in first-appearance order
export function nightsByRoom(facts: readonly RoomUsageFact[]): RoomNights[] {
  const rooms = new Map<string, RoomNights>();
  for (const f of facts) {
    const r = rooms.get(f.room_number);
    if (r) {
      r.stays += 1;
      r.total_nights += f.nights;
    } else {
      rooms.set(f.room_number, {
        room_number: f.room_number,
        room_type: f.room_type,
        stays: 1,
        total_nights: f.nights,
      });
    }
  }
  return Array.from(rooms.values(), (r) => ({ ...r, total_nights: round(r.total_nights, 2) }));
}

export function topRooms(facts: readonly RoomUsageFact[], n: number): RoomNights[] {
  const ranked = nightsByRoom(facts).sort((a, b) => b.total_nights - a.total_nights);
  return topN(ranked, n);
}
