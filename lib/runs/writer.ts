import { promises as fs } from "fs";
import path from "path";
import { format } from "date-fns";
import { tableToCsv } from "@/lib/csv/exportTables";
import type { ReportPayload } from "@/lib/report/assemble";
import { renderChartPng, renderReportHtml } from "@/lib/report/render";
import { reportTables } from "@/lib/report/tables";

export const RUN_DIR_PREFIX = "hsk_report_";

export type RunMeta = {
  run_id: string;
  created_at: string;
  inputs: { housekeeping: string; room_usage: string };
  config: ReportPayload["config"];
  rows: { housekeeping: number; room_usage: number };
  parse_warnings: number;
  files: string[];
};

export type RunArtifacts = {
  dir: string;
  runId: string;
  files: string[];
};

export function runStamp(now: Date): string {
  return format(now, "yyyyMMdd_HHmmss");
}

// Fresh directory per run; a same-second collision gets a numeric suffix
export async function createRunDir(outBase: string, now: Date): Promise<{ dir: string; runId: string }> {
  await fs.mkdir(outBase, { recursive: true });
  const base = `${RUN_DIR_PREFIX}${runStamp(now)}`;
  for (let i = 1; i < 100; i++) {
    const runId = i === 1 ? base : `${base}_${i}`;
    const dir = path.join(outBase, runId);
    try {
      await fs.mkdir(dir);
      return { dir, runId };
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "EEXIST") continue;
      throw e;
    }
  }
  throw new Error(`Could not create a fresh run directory under ${outBase}`);
}

// Everything the rendering layer emits for one payload: filename → contents
export function renderArtifacts(payload: ReportPayload, runId: string): Map<string, string | Buffer> {
  const out = new Map<string, string | Buffer>();
  for (const t of reportTables(payload)) out.set(t.filename, tableToCsv(t.table));
  for (const c of payload.charts) out.set(c.filename, renderChartPng(c));
  out.set("report.html", renderReportHtml(payload, runId));
  return out;
}

export async function writeRunArtifacts(opts: {
  outBase: string;
  payload: ReportPayload;
  now: Date;
  inputs: RunMeta["inputs"];
  parseWarnings: number;
}): Promise<RunArtifacts> {
  const { dir, runId } = await createRunDir(opts.outBase, opts.now);
  const artifacts = renderArtifacts(opts.payload, runId);

  for (const [name, body] of artifacts) {
    await fs.writeFile(path.join(dir, name), body);
  }

  const files = [...artifacts.keys(), "run_meta.json"].sort();
  const meta: RunMeta = {
    run_id: runId,
    created_at: opts.now.toISOString(),
    inputs: opts.inputs,
    config: opts.payload.config,
    rows: {
      housekeeping: opts.payload.housekeeping.kpis.rows,
      room_usage: opts.payload.room_usage.kpis.rows,
    },
    parse_warnings: opts.parseWarnings,
    files,
  };
  await fs.writeFile(path.join(dir, "run_meta.json"), JSON.stringify(meta, null, 2) + "\n", "utf8");

  return { dir, runId, files };
}
