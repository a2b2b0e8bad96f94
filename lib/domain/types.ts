// Domain models for the housekeeping + room usage pipeline

export type TableKind = "housekeeping" | "room_usage";

// Raw header-keyed row as parsed from CSV; every cell is an opaque string
export type RawRow = Record<string, string>;

export type HousekeepingRow = {
  room_number: string;
  room_type: string;
  fd_status: string;
  hsk_before: string;
  hsk_after: string;
  housekeeper_before: string; // "Unknown" when blank
  housekeeper_after: string; // "Unknown" when blank
  username: string; // "Unknown" when blank
  date_raw: string;
  timestamp: Date | null; // null when the Date cell failed to parse
};

export type HousekeepingFact = HousekeepingRow & {
  changed: boolean;
  transition: string; // "Before → After"
  day: string | null; // yyyy-MM-dd
};

export type RoomUsageRow = {
  room_number: string;
  room_type: string;
  nights_raw: string;
  features_raw: string;
};

export type RoomUsageFact = RoomUsageRow & {
  nights: number; // >= 0; unparsable → 0
  features: string[];
};

export type FeatureFact = {
  feature: string;
  nights: number;
  room_number: string;
};

export type AggregateGroup = {
  key: string | null; // null only for the by-day "unparsed" group
  rows: number;
  unique_rooms: number;
  changed: number;
  change_rate: number; // 4 decimals
};

export type TransitionMatrix = {
  before: string[]; // row labels, ascending
  after: string[]; // column labels, ascending
  counts: number[][]; // counts[i][j] for before[i] → after[j]
};

export type RoomTypeUsage = {
  room_type: string;
  rooms: number;
  total_nights: number;
  avg_nights_per_room: number; // 2 decimals
};

export type FeatureUsage = {
  feature: string;
  mentions: number;
  rooms: number;
  total_nights: number;
  avg_nights_per_room: number; // 2 decimals
};

export type RoomNights = {
  room_number: string;
  room_type: string;
  stays: number;
  total_nights: number;
};

export type RotationQuality = "Very Low" | "Low" | "Moderate" | "High";

export type RotationRecord = {
  username: string;
  total_actions: number;
  unique_rooms: number;
  status_changes: number;
  room_uniqueness_rate: number; // 3 decimals
  rotation_quality: RotationQuality;
  room_randomness: number; // 4 decimals, in [0, 1]
  room_randomness_rank: number; // dense, 1 = most evenly spread
};
