import { resolveConfig, type ReportConfig, type ReportConfigInput } from "@/lib/analytics/config";
import { deriveHousekeepingFacts, deriveRoomUsageFacts } from "@/lib/analytics/facts";
import { ensureSourceExists, loadCsvFile } from "@/lib/ingest/load";
import { normalizeHousekeeping, normalizeRoomUsage, validateColumns } from "@/lib/ingest/normalize";
import type { ParseReport } from "@/lib/ingest/parse";
import { assembleReport, type ReportPayload } from "@/lib/report/assemble";
import { writeRunArtifacts, type RunArtifacts } from "@/lib/runs/writer";

export type AnalyzeOptions = {
  now: Date;
  anonymize?: boolean;
};

export type AnalysisResult = {
  payload: ReportPayload;
  parseWarnings: number;
};

// Pure, synchronous: both schemas are checked before any row is touched
export function analyzeTables(
  tables: { housekeeping: ParseReport; roomUsage: ParseReport },
  config: ReportConfig,
  options: AnalyzeOptions
): AnalysisResult {
  validateColumns("housekeeping", tables.housekeeping.headers);
  validateColumns("room_usage", tables.roomUsage.headers);

  const hskFacts = deriveHousekeepingFacts(
    normalizeHousekeeping(tables.housekeeping, { anonymize: options.anonymize })
  );
  const usageFacts = deriveRoomUsageFacts(normalizeRoomUsage(tables.roomUsage));

  const payload = assembleReport(
    { housekeeping: hskFacts, roomUsage: usageFacts, generatedAt: options.now },
    config
  );

  const unparsedDates = hskFacts.filter((f) => f.day === null).length;
  const parseWarnings =
    tables.housekeeping.errors.length + tables.roomUsage.errors.length + unparsedDates;

  return { payload, parseWarnings };
}

export type RunReportOptions = {
  housekeepingPath: string;
  roomUsagePath: string;
  outBase: string;
  config?: ReportConfigInput;
  anonymize?: boolean;
  now?: Date;
  verbose?: boolean;
};

export type RunReportResult = RunArtifacts & { payload: ReportPayload };

// Validates and analyses everything before the output directory is created
export async function runReport(opts: RunReportOptions): Promise<RunReportResult> {
  const config = resolveConfig(opts.config);
  const now = opts.now ?? new Date();

  await ensureSourceExists(opts.housekeepingPath);
  await ensureSourceExists(opts.roomUsagePath);

  const housekeeping = await loadCsvFile(opts.housekeepingPath);
  const roomUsage = await loadCsvFile(opts.roomUsagePath);
  if (opts.verbose) {
    console.debug(`[pipeline] housekeeping rows=${housekeeping.rowCount} room_usage rows=${roomUsage.rowCount}`);
  }

  const { payload, parseWarnings } = analyzeTables(
    { housekeeping, roomUsage },
    config,
    { now, anonymize: opts.anonymize }
  );
  if (payload.housekeeping.kpis.date_parse_success_rate < 1 && payload.housekeeping.kpis.rows > 0) {
    console.warn(
      `[pipeline] date parse success rate ${(payload.housekeeping.kpis.date_parse_success_rate * 100).toFixed(1)}%`
    );
  }

  const artifacts = await writeRunArtifacts({
    outBase: opts.outBase,
    payload,
    now,
    inputs: { housekeeping: opts.housekeepingPath, room_usage: opts.roomUsagePath },
    parseWarnings,
  });
  if (opts.verbose) console.debug(`[runs] wrote ${artifacts.files.length} files to ${artifacts.dir}`);

  return { ...artifacts, payload };
}
