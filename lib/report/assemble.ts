import type {
  AggregateGroup,
  FeatureUsage,
  HousekeepingFact,
  RoomNights,
  RoomTypeUsage,
  RoomUsageFact,
  RotationRecord,
  TransitionMatrix,
} from "@/lib/domain/types";
import {
  groupByClosingHousekeeper,
  groupByDay,
  groupByRoomType,
  groupByUsername,
  round,
  topN,
  topRooms,
  topTransition,
  transitionMatrix,
  usageByFeature,
  usageByRoomType,
} from "@/lib/analytics/aggregate";
import type { ReportConfig } from "@/lib/analytics/config";
import { dateParseSuccessRate, expandFeatures } from "@/lib/analytics/facts";
import { rotationCallouts, scoreRotation } from "@/lib/analytics/rotation";

export type ChartSection = "housekeeping" | "room_usage" | "rotation";

export type ChartPoint = { label: string; value: number };

export type ChartSpec = {
  id: string;
  title: string;
  filename: string;
  section: ChartSection;
  value_label: string;
  data: ChartPoint[];
};

export type HousekeepingKpis = {
  rows: number;
  changed_rows: number;
  change_rate: number;
  unique_rooms: number;
  unique_usernames: number;
  date_parse_success_rate: number;
  first_day: string | null;
  last_day: string | null;
};

export type RoomUsageKpis = {
  rows: number;
  unique_rooms: number;
  total_nights: number;
  avg_nights_per_room: number;
};

export type HousekeepingSection = {
  kpis: HousekeepingKpis;
  exec_notes: string[];
  tables: {
    by_day: AggregateGroup[];
    by_room_type: AggregateGroup[];
    by_hk_after: AggregateGroup[];
    by_user: AggregateGroup[];
    transition_matrix: TransitionMatrix;
  };
};

export type RoomUsageSection = {
  kpis: RoomUsageKpis;
  exec_notes: string[];
  tables: {
    by_room_type: RoomTypeUsage[];
    top_rooms: RoomNights[];
    by_feature: FeatureUsage[];
  };
};

export type RotationSection = {
  uniqueness_by_user: RotationRecord[];
  callouts: RotationRecord[];
};

export type ReportPayload = {
  title: string;
  generated_at: string;
  config: ReportConfig;
  housekeeping: HousekeepingSection;
  room_usage: RoomUsageSection;
  rotation: RotationSection;
  charts: ChartSpec[]; // fixed declaration order; entries without data are left out
};

export type AssembleInput = {
  housekeeping: readonly HousekeepingFact[];
  roomUsage: readonly RoomUsageFact[];
  generatedAt: Date;
};

const pct = (n: number) => (n * 100).toFixed(1) + "%";
const num = (n: number) => String(round(n, 2));
const plural = (n: number, word: string) => `${num(n)} ${word}${n === 1 ? "" : "s"}`;

export function buildHousekeepingSection(
  facts: readonly HousekeepingFact[]
): HousekeepingSection {
  const by_day = groupByDay(facts);
  const by_room_type = groupByRoomType(facts);
  const by_hk_after = groupByClosingHousekeeper(facts);
  const by_user = groupByUsername(facts);
  const transition_matrix = transitionMatrix(facts);

  const changed = facts.filter((f) => f.changed).length;
  const days = by_day.flatMap((d) => (d.key === null ? [] : [d.key]));
  const kpis: HousekeepingKpis = {
    rows: facts.length,
    changed_rows: changed,
    change_rate: facts.length > 0 ? round(changed / facts.length, 4) : 0,
    unique_rooms: new Set(facts.map((f) => f.room_number)).size,
    unique_usernames: by_user.length,
    date_parse_success_rate: round(dateParseSuccessRate(facts), 4),
    first_day: days[0] ?? null,
    last_day: days[days.length - 1] ?? null,
  };

  const notes: string[] = [];
  const busiest = by_day
    .filter((d) => d.key !== null)
    .sort((a, b) => b.changed - a.changed || b.rows - a.rows)[0];
  if (busiest) {
    notes.push(
      `Busiest day: ${busiest.key} (${plural(busiest.changed, "status change")} across ${plural(busiest.rows, "row")}).`
    );
  }
  const topType = by_room_type[0];
  if (topType) {
    notes.push(
      `Most changed room type: ${topType.key} (${plural(topType.changed, "change")}, ${pct(topType.change_rate)} change rate).`
    );
  }
  const topHk = by_hk_after[0];
  if (topHk) {
    notes.push(`Top closing housekeeper: ${topHk.key} (${plural(topHk.changed, "change")}).`);
  }
  const topUser = by_user[0];
  if (topUser) {
    notes.push(
      `Most active username: ${topUser.key} (${plural(topUser.rows, "action")}, ${plural(topUser.changed, "change")}).`
    );
  }
  const topMove = topTransition(facts);
  if (topMove) {
    notes.push(`Most common status change: ${topMove.transition} (${topMove.count}).`);
  }

  return {
    kpis,
    exec_notes: notes,
    tables: { by_day, by_room_type, by_hk_after, by_user, transition_matrix },
  };
}

export function buildRoomUsageSection(
  facts: readonly RoomUsageFact[],
  config: Pick<ReportConfig, "topN">
): RoomUsageSection {
  const by_room_type = usageByRoomType(facts);
  const top_rooms = topRooms(facts, config.topN);
  const by_feature = usageByFeature(expandFeatures(facts));

  const uniqueRooms = new Set(facts.map((f) => f.room_number)).size;
  const totalNights = facts.reduce((s, f) => s + f.nights, 0);
  const kpis: RoomUsageKpis = {
    rows: facts.length,
    unique_rooms: uniqueRooms,
    total_nights: round(totalNights, 2),
    avg_nights_per_room: uniqueRooms > 0 ? round(totalNights / uniqueRooms, 2) : 0,
  };

  const notes: string[] = [];
  const topType = by_room_type[0];
  if (topType) {
    notes.push(
      `Most-used room type: ${topType.room_type} (${plural(topType.total_nights, "night")} across ${plural(topType.rooms, "room")}).`
    );
  }
  const topRoom = top_rooms[0];
  if (topRoom) {
    notes.push(`Most-used room: ${topRoom.room_number} (${plural(topRoom.total_nights, "night")}).`);
  }
  const topFeature = by_feature[0];
  if (topFeature) {
    notes.push(
      `Top feature: ${topFeature.feature} (${plural(topFeature.total_nights, "night")}, ${plural(topFeature.mentions, "mention")}).`
    );
  }

  return { kpis, exec_notes: notes, tables: { by_room_type, top_rooms, by_feature } };
}

export function buildRotationSection(
  facts: readonly HousekeepingFact[],
  config: Pick<ReportConfig, "bands" | "calloutMinActions" | "calloutLimit">
): RotationSection {
  const uniqueness_by_user = scoreRotation(facts, config);
  return { uniqueness_by_user, callouts: rotationCallouts(uniqueness_by_user, config) };
}

const groupPoints = (groups: AggregateGroup[], pick: (g: AggregateGroup) => number): ChartPoint[] =>
  groups.map((g) => ({ label: g.key ?? "Unparsed", value: pick(g) }));

// Declaration order here is the report's chart order
export function chartInventory(
  hsk: HousekeepingSection,
  usage: RoomUsageSection,
  rotation: RotationSection,
  config: Pick<ReportConfig, "topN" | "calloutMinActions">
): ChartSpec[] {
  const n = config.topN;
  const eligible = rotation.uniqueness_by_user.filter(
    (r) => r.total_actions >= config.calloutMinActions
  );
  const specs: ChartSpec[] = [
    {
      id: "hsk_changes_by_day",
      title: "Status changes by day",
      filename: "hsk_changes_by_day.png",
      section: "housekeeping",
      value_label: "changed",
      data: groupPoints(
        hsk.tables.by_day.filter((d) => d.key !== null),
        (g) => g.changed
      ),
    },
    {
      id: "hsk_changes_by_room_type",
      title: `Top ${n} room types by status changes`,
      filename: "hsk_top_room_types_changed.png",
      section: "housekeeping",
      value_label: "changed",
      data: groupPoints(topN(hsk.tables.by_room_type, n), (g) => g.changed),
    },
    {
      id: "hsk_changes_by_hk_after",
      title: `Top ${n} closing housekeepers by status changes`,
      filename: "hsk_top_closing_housekeepers.png",
      section: "housekeeping",
      value_label: "changed",
      data: groupPoints(topN(hsk.tables.by_hk_after, n), (g) => g.changed),
    },
    {
      id: "hsk_actions_by_user",
      title: `Top ${n} usernames by actions`,
      filename: "hsk_top_usernames.png",
      section: "housekeeping",
      value_label: "rows",
      data: groupPoints(topN(hsk.tables.by_user, n), (g) => g.rows),
    },
    {
      id: "room_usage_nights_by_room_type",
      title: `Top ${n} room types by nights`,
      filename: "room_usage_nights_by_room_type.png",
      section: "room_usage",
      value_label: "total_nights",
      data: topN(usage.tables.by_room_type, n).map((r) => ({ label: r.room_type, value: r.total_nights })),
    },
    {
      id: "room_usage_top_rooms",
      title: `Top ${n} rooms by nights`,
      filename: "room_usage_top_rooms.png",
      section: "room_usage",
      value_label: "total_nights",
      data: usage.tables.top_rooms.map((r) => ({ label: r.room_number, value: r.total_nights })),
    },
    {
      id: "room_usage_top_features",
      title: `Top ${n} features by nights`,
      filename: "room_usage_top_features.png",
      section: "room_usage",
      value_label: "total_nights",
      data: topN(usage.tables.by_feature, n).map((f) => ({ label: f.feature, value: f.total_nights })),
    },
    {
      id: "rotation_uniqueness",
      title: `Lowest room uniqueness rate (${config.calloutMinActions}+ actions)`,
      filename: "username_room_uniqueness.png",
      section: "rotation",
      value_label: "room_uniqueness_rate",
      data: topN(eligible, n).map((r) => ({ label: r.username, value: r.room_uniqueness_rate })),
    },
  ];
  return specs.filter((s) => s.data.length > 0);
}

// Pure: no file I/O, clock injected through generatedAt
export function assembleReport(input: AssembleInput, config: ReportConfig): ReportPayload {
  const housekeeping = buildHousekeepingSection(input.housekeeping);
  const room_usage = buildRoomUsageSection(input.roomUsage, config);
  const rotation = buildRotationSection(input.housekeeping, config);
  return {
    title: config.title,
    generated_at: input.generatedAt.toISOString(),
    config,
    housekeeping,
    room_usage,
    rotation,
    charts: chartInventory(housekeeping, room_usage, rotation, config),
  };
}
