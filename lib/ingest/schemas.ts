import { z } from "zod";
import type { TableKind } from "@/lib/domain/types";
import { UNKNOWN } from "./aliases";

// Required headers per table kind, in export order
export const REQUIRED_COLUMNS: Record<TableKind, readonly string[]> = {
  housekeeping: [
    "Room Number",
    "Room Type",
    "FD Status",
    "HSK Status Before",
    "HSK Status After",
    "Housekeeper Before",
    "Housekeeper After",
    "Username",
    "Date",
  ],
  room_usage: ["Room Number", "Room Type", "Number of Nights", "Orientation/Features"],
};

// Helpers
const toCell = z
  .union([z.string(), z.null(), z.undefined()])
  .transform((v) => (v ?? "").trim());

const toCategory = toCell.transform((s) => (s === "" ? UNKNOWN : s));

// Row schemas after aliasing
export const HousekeepingCsvSchema = z.object({
  room_number: toCell,
  room_type: toCell,
  fd_status: toCell,
  hsk_before: toCell,
  hsk_after: toCell,
  housekeeper_before: toCategory,
  housekeeper_after: toCategory,
  username: toCategory,
  date: toCell,
});

export type HousekeepingCsv = z.infer<typeof HousekeepingCsvSchema>;

export const RoomUsageCsvSchema = z.object({
  room_number: toCell,
  room_type: toCell,
  nights: toCell,
  features: toCell,
});

export type RoomUsageCsv = z.infer<typeof RoomUsageCsvSchema>;

// Lower-cased header → canonical key
export const HSK_ALIASES: Record<string, keyof HousekeepingCsv> = {
  "room number": "room_number",
  "room no": "room_number",
  "room type": "room_type",
  "fd status": "fd_status",
  "hsk status before": "hsk_before",
  "hsk status after": "hsk_after",
  "housekeeper before": "housekeeper_before",
  "housekeeper after": "housekeeper_after",
  username: "username",
  "user name": "username",
  date: "date",
};

export const USAGE_ALIASES: Record<string, keyof RoomUsageCsv> = {
  "room number": "room_number",
  "room no": "room_number",
  "room type": "room_type",
  "number of nights": "nights",
  nights: "nights",
  "orientation/features": "features",
  features: "features",
};

export const ALIASES: Record<TableKind, Record<string, string>> = {
  housekeeping: HSK_ALIASES,
  room_usage: USAGE_ALIASES,
};
