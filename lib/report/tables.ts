import type {
  AggregateGroup,
  FeatureUsage,
  RoomNights,
  RoomTypeUsage,
  RotationRecord,
  TransitionMatrix,
} from "@/lib/domain/types";
import type { ReportPayload } from "./assemble";

export type Cell = string | number | boolean | null;

export type ColumnDef<T> = {
  header: string;
  accessor: (row: T) => Cell;
};

export type DataTable = {
  headers: string[];
  rows: Cell[][];
};

export function toTable<T>(rows: readonly T[], columns: readonly ColumnDef<T>[]): DataTable {
  return {
    headers: columns.map((c) => c.header),
    rows: rows.map((r) => columns.map((c) => c.accessor(r))),
  };
}

// Flat key/value objects (KPIs) become a single-row table
export function recordTable(record: Record<string, Cell>): DataTable {
  return { headers: Object.keys(record), rows: [Object.values(record)] };
}

export function matrixTable(m: TransitionMatrix): DataTable {
  return {
    headers: ["HSK Status Before", ...m.after],
    rows: m.before.map((b, i) => [b, ...m.counts[i]]),
  };
}

export function groupColumns(keyHeader: string): ColumnDef<AggregateGroup>[] {
  return [
    { header: keyHeader, accessor: (g) => g.key },
    { header: "rows", accessor: (g) => g.rows },
    { header: "unique_rooms", accessor: (g) => g.unique_rooms },
    { header: "changed", accessor: (g) => g.changed },
    { header: "change_rate", accessor: (g) => g.change_rate },
  ];
}

export const ROOM_TYPE_USAGE_COLUMNS: ColumnDef<RoomTypeUsage>[] = [
  { header: "Room Type", accessor: (r) => r.room_type },
  { header: "rooms", accessor: (r) => r.rooms },
  { header: "total_nights", accessor: (r) => r.total_nights },
  { header: "avg_nights_per_room", accessor: (r) => r.avg_nights_per_room },
];

export const TOP_ROOM_COLUMNS: ColumnDef<RoomNights>[] = [
  { header: "Room Number", accessor: (r) => r.room_number },
  { header: "Room Type", accessor: (r) => r.room_type },
  { header: "stays", accessor: (r) => r.stays },
  { header: "total_nights", accessor: (r) => r.total_nights },
];

export const FEATURE_COLUMNS: ColumnDef<FeatureUsage>[] = [
  { header: "feature", accessor: (f) => f.feature },
  { header: "mentions", accessor: (f) => f.mentions },
  { header: "rooms", accessor: (f) => f.rooms },
  { header: "total_nights", accessor: (f) => f.total_nights },
  { header: "avg_nights_per_room", accessor: (f) => f.avg_nights_per_room },
];

export const ROTATION_COLUMNS: ColumnDef<RotationRecord>[] = [
  { header: "Username", accessor: (r) => r.username },
  { header: "total_actions", accessor: (r) => r.total_actions },
  { header: "unique_rooms", accessor: (r) => r.unique_rooms },
  { header: "status_changes", accessor: (r) => r.status_changes },
  { header: "room_uniqueness_rate", accessor: (r) => r.room_uniqueness_rate },
  { header: "rotation_quality", accessor: (r) => r.rotation_quality },
  { header: "room_randomness", accessor: (r) => r.room_randomness },
  { header: "room_randomness_rank", accessor: (r) => r.room_randomness_rank },
];

export type ReportTableName =
  | "hsk_kpis"
  | "by_day"
  | "by_room_type"
  | "by_hk_after"
  | "by_user"
  | "transition_matrix"
  | "room_usage_kpis"
  | "room_usage_by_room_type"
  | "top_rooms"
  | "by_feature"
  | "uniqueness_by_user";

export type ReportTable = {
  name: ReportTableName;
  filename: string;
  caption: string;
  table: DataTable;
};

// Every CSV artifact, in report order
export function reportTables(payload: ReportPayload): ReportTable[] {
  const hsk = payload.housekeeping;
  const usage = payload.room_usage;
  return [
    { name: "hsk_kpis", filename: "summary_kpis.csv", caption: "Housekeeping KPIs", table: recordTable(hsk.kpis) },
    { name: "by_day", filename: "summary_by_day.csv", caption: "By day", table: toTable(hsk.tables.by_day, groupColumns("day")) },
    { name: "by_room_type", filename: "summary_by_room_type.csv", caption: "By room type", table: toTable(hsk.tables.by_room_type, groupColumns("Room Type")) },
    { name: "by_hk_after", filename: "summary_by_hk_after.csv", caption: "By housekeeper (After)", table: toTable(hsk.tables.by_hk_after, groupColumns("Housekeeper After")) },
    { name: "by_user", filename: "summary_by_user.csv", caption: "By username", table: toTable(hsk.tables.by_user, groupColumns("Username")) },
    { name: "transition_matrix", filename: "summary_hsk_transition_matrix.csv", caption: "HSK transition matrix (Before → After)", table: matrixTable(hsk.tables.transition_matrix) },
    { name: "room_usage_kpis", filename: "room_usage_kpis.csv", caption: "Room usage KPIs", table: recordTable(usage.kpis) },
    { name: "room_usage_by_room_type", filename: "room_usage_by_room_type.csv", caption: "Nights by room type", table: toTable(usage.tables.by_room_type, ROOM_TYPE_USAGE_COLUMNS) },
    { name: "top_rooms", filename: "room_usage_top_rooms.csv", caption: "Top rooms by nights", table: toTable(usage.tables.top_rooms, TOP_ROOM_COLUMNS) },
    { name: "by_feature", filename: "room_usage_by_feature.csv", caption: "Orientation/Features rollup", table: toTable(usage.tables.by_feature, FEATURE_COLUMNS) },
    { name: "uniqueness_by_user", filename: "username_room_rotation_uniqueness.csv", caption: "Room rotation by username", table: toTable(payload.rotation.uniqueness_by_user, ROTATION_COLUMNS) },
  ];
}
