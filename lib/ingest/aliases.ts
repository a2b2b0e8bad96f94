// Header normalization, name anonymization and feature tokenizing

export const UNKNOWN = "Unknown";

export function normalizeHeaderKey(header: string): string {
  return header.trim().replace(/\s+/g, " ").toLowerCase();
}

// "Last, First" → "First Last"; multi-token names reduce to "First L."
export function anonymizeName(name: string | null | undefined): string {
  if (name === null || name === undefined) return "";
  let s = String(name).trim().replace(/\s+/g, " ");
  if (!s) return "";

  const comma = s.indexOf(",");
  if (comma >= 0) {
    const last = s.slice(0, comma).trim();
    const first = s.slice(comma + 1).trim();
    if (first) s = `${first} ${last}`.trim();
  }

  const parts = s.split(" ").filter(Boolean);
  if (parts.length === 1) return parts[0];
  const lastPart = parts[parts.length - 1];
  return `${parts[0]} ${lastPart[0].toUpperCase()}.`;
}

// "|", "/", ";" and "," are interchangeable separators
export function splitFeatures(raw: string | null | undefined): string[] {
  if (!raw) return [];
  return String(raw)
    .split(/[|/;,]/)
    .map((s) => s.trim())
    .filter(Boolean);
}
