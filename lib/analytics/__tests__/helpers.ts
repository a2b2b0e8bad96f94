import type { HousekeepingFact, RoomUsageFact } from "@/lib/domain/types";
import { deriveHousekeepingFacts, deriveRoomUsageFacts } from "@/lib/analytics/facts";
import { normalizeHousekeeping, normalizeRoomUsage } from "@/lib/ingest/normalize";
import { parseCsvText } from "@/lib/ingest/parse";

export const HSK_HEADER =
  "Room Number,Room Type,FD Status,HSK Status Before,HSK Status After,Housekeeper Before,Housekeeper After,Username,Date";

export const USAGE_HEADER = "Room Number,Room Type,Number of Nights,Orientation/Features";

// Five rows, four real changes, one unparsable date
export const SAMPLE_HSK_ROWS = [
  "101,King,VC,Dirty,Clean,Ann,Bob,alice,01/05/2025 08:00",
  "101,King,VC,Clean,Clean,Ann,Bob,alice,01/05/2025 09:00",
  "102,Queen,OC,Dirty,Inspected,Cy,Dee,bob,01/04/2025 10:00",
  "103,Queen,VC,Clean,Dirty,Cy,Bob,bob,garbage",
  "104,Suite,VC,Dirty,Clean,Cy,Dee,carol,01/06/2025 07:15",
];

export const SAMPLE_USAGE_ROWS = ["R1,Suite,3,Ocean/View", "R2,Suite,2,Ocean"];

export function hskCsv(rows: string[]): string {
  return [HSK_HEADER, ...rows].join("\n") + "\n";
}

export function usageCsv(rows: string[]): string {
  return [USAGE_HEADER, ...rows].join("\n") + "\n";
}

export function hskFacts(rows: string[]): HousekeepingFact[] {
  return deriveHousekeepingFacts(normalizeHousekeeping(parseCsvText(hskCsv(rows))));
}

export function usageFacts(rows: string[]): RoomUsageFact[] {
  return deriveRoomUsageFacts(normalizeRoomUsage(parseCsvText(usageCsv(rows))));
}

export function fact(username: string, room: string, changed = true): HousekeepingFact {
  return {
    room_number: room,
    room_type: "King",
    fd_status: "VC",
    hsk_before: "Dirty",
    hsk_after: changed ? "Clean" : "Dirty",
    housekeeper_before: "Unknown",
    housekeeper_after: "Unknown",
    username,
    date_raw: "",
    timestamp: null,
    changed,
    transition: changed ? "Dirty → Clean" : "Dirty → Dirty",
    day: null,
  };
}

// `count` actions spread round-robin over `rooms` distinct rooms
export function userActions(username: string, count: number, rooms: number): HousekeepingFact[] {
  return Array.from({ length: count }, (_, i) => fact(username, `${username}-${i % rooms}`));
}
