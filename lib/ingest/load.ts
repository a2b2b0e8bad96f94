import { promises as fs } from "fs";
import { SourceNotFoundError } from "./errors";
import { parseCsvText, type ParseReport } from "./parse";

export async function ensureSourceExists(filePath: string): Promise<void> {
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) throw new SourceNotFoundError(filePath);
  } catch (e) {
    if (e instanceof SourceNotFoundError) throw e;
    if (isErrnoException(e) && (e.code === "ENOENT" || e.code === "ENOTDIR")) {
      throw new SourceNotFoundError(filePath);
    }
    throw e;
  }
}

export async function loadCsvFile(filePath: string): Promise<ParseReport> {
  await ensureSourceExists(filePath);
  const text = await fs.readFile(filePath, "utf8");
  const report = parseCsvText(text);
  for (const err of report.errors.slice(0, 5)) {
    console.warn(`[ingest] ${filePath} row ${err.row}: ${err.message}`);
  }
  if (report.errors.length > 5) {
    console.warn(`[ingest] ${filePath}: ${report.errors.length - 5} more CSV issue(s)`);
  }
  return report;
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}
