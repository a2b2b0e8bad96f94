import { format, isValid, parse, parseISO } from "date-fns";

// Export format is MM/DD/YYYY HH:MM; two-letter tokens also take single digits
export const PRIMARY_DATE_FORMAT = "MM/dd/yyyy HH:mm";

const REFERENCE_DATE = new Date(2000, 0, 1);

// date-fns reads "yyyy" as any 1-4 digit year, so "01/05/25" would land in year 25
const PRIMARY_SHAPE = /^\d{1,2}\/\d{1,2}\/\d{4}\s+\d{1,2}:\d{2}$/;

export function parseLogDate(value: string | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  const s = String(value).trim();
  if (!s) return null;

  if (PRIMARY_SHAPE.test(s)) {
    const primary = parse(s, PRIMARY_DATE_FORMAT, REFERENCE_DATE);
    if (isValid(primary)) return primary;
  }

  const iso = parseISO(s);
  if (isValid(iso)) return iso;

  // Last resort: platform parser ("Jan 5 2025 8:30 AM", "1/5/2025 8:30:00 PM", ...)
  const loose = new Date(s);
  return isValid(loose) ? loose : null;
}

export function toDayKey(ts: Date | null): string | null {
  return ts ? format(ts, "yyyy-MM-dd") : null;
}
