import { describe, it, expect } from "vitest";
import { resolveConfig } from "@/lib/analytics/config";
import { escapeCSVField, formatCSVValue, tableToCsv } from "@/lib/csv/exportTables";
import { assembleReport, type ChartSpec } from "@/lib/report/assemble";
import { renderChartPng, renderChartSvg, renderReportHtml } from "@/lib/report/render";
import { reportTables } from "@/lib/report/tables";
import { SAMPLE_HSK_ROWS, SAMPLE_USAGE_ROWS, hskFacts, usageFacts } from "@/lib/analytics/__tests__/helpers";

const GENERATED_AT = new Date(Date.UTC(2025, 0, 7, 9, 30, 0));

function samplePayload(topN = 2) {
  return assembleReport(
    {
      housekeeping: hskFacts(SAMPLE_HSK_ROWS),
      roomUsage: usageFacts(SAMPLE_USAGE_ROWS),
      generatedAt: GENERATED_AT,
    },
    resolveConfig({ topN, title: "Weekly HSK" })
  );
}

function csvFor(filename: string, payload = samplePayload()): string {
  const t = reportTables(payload).find((r) => r.filename === filename);
  if (!t) throw new Error(`no table ${filename}`);
  return tableToCsv(t.table);
}

describe("assembleReport", () => {
  it("computes housekeeping KPIs", () => {
    const p = samplePayload();
    expect(p.title).toBe("Weekly HSK");
    expect(p.generated_at).toBe("2025-01-07T09:30:00.000Z");
    expect(p.housekeeping.kpis).toEqual({
      rows: 5,
      changed_rows: 4,
      change_rate: 0.8,
      unique_rooms: 4,
      unique_usernames: 3,
      date_parse_success_rate: 0.8,
      first_day: "2025-01-04",
      last_day: "2025-01-06",
    });
    expect(p.room_usage.kpis).toEqual({ rows: 2, unique_rooms: 2, total_nights: 5, avg_nights_per_room: 2.5 });
  });

  it("writes executive notes from the leading rows", () => {
    const p = samplePayload();
    expect(p.housekeeping.exec_notes).toEqual([
      "Busiest day: 2025-01-05 (1 status change across 2 rows).",
      "Most changed room type: Queen (2 changes, 100.0% change rate).",
      "Top closing housekeeper: Bob (2 changes).",
      "Most active username: bob (2 actions, 2 changes).",
      "Most common status change: Dirty → Clean (2).",
    ]);
    expect(p.room_usage.exec_notes).toEqual([
      "Most-used room type: Suite (5 nights across 2 rooms).",
      "Most-used room: R1 (3 nights).",
      "Top feature: Ocean (5 nights, 2 mentions).",
    ]);
  });

  it("lists charts in fixed order and skips the ones without data", () => {
    const p = samplePayload();
    expect(p.charts.map((c) => c.filename)).toEqual([
      "hsk_changes_by_day.png",
      "hsk_top_room_types_changed.png",
      "hsk_top_closing_housekeepers.png",
      "hsk_top_usernames.png",
      "room_usage_nights_by_room_type.png",
      "room_usage_top_rooms.png",
      "room_usage_top_features.png",
    ]);
    expect(p.charts[1].data).toEqual([
      { label: "Queen", value: 2 },
      { label: "King", value: 1 },
    ]);
    expect(p.rotation.callouts).toEqual([]);
    expect(p.rotation.uniqueness_by_user).toHaveLength(3);
  });

  it("handles empty inputs", () => {
    const p = assembleReport({ housekeeping: [], roomUsage: [], generatedAt: GENERATED_AT }, resolveConfig());
    expect(p.housekeeping.kpis.rows).toBe(0);
    expect(p.housekeeping.kpis.change_rate).toBe(0);
    expect(p.housekeeping.kpis.first_day).toBeNull();
    expect(p.housekeeping.exec_notes).toEqual([]);
    expect(p.room_usage.kpis.avg_nights_per_room).toBe(0);
    expect(p.charts).toEqual([]);
    expect(p.housekeeping.tables.transition_matrix).toEqual({ before: [], after: [], counts: [] });
  });
});

describe("csv export", () => {
  it("quotes fields with delimiters, quotes and line breaks", () => {
    expect(
      tableToCsv({
        headers: ["a", "b"],
        rows: [
          ["x,y", 'say "hi"'],
          [null, Number.NaN],
          [true, "line\nbreak"],
        ],
      })
    ).toBe('a,b\n"x,y","say ""hi"""\n,\ntrue,"line\nbreak"\n');
    expect(escapeCSVField("plain")).toBe("plain");
    expect(formatCSVValue(0.6667)).toBe("0.6667");
  });

  it("writes summary tables in report order", () => {
    expect(csvFor("summary_by_user.csv")).toBe(
      "Username,rows,unique_rooms,changed,change_rate\nbob,2,2,2,1\nalice,2,1,1,0.5\ncarol,1,1,1,1\n"
    );
    expect(csvFor("summary_hsk_transition_matrix.csv")).toBe(
      "HSK Status Before,Clean,Dirty,Inspected\nClean,1,1,0\nDirty,2,0,1\n"
    );
    expect(csvFor("summary_kpis.csv")).toBe(
      "rows,changed_rows,change_rate,unique_rooms,unique_usernames,date_parse_success_rate,first_day,last_day\n" +
        "5,4,0.8,4,3,0.8,2025-01-04,2025-01-06\n"
    );
  });

  it("leaves the unparsed-day key blank", () => {
    const lines = csvFor("summary_by_day.csv").trimEnd().split("\n");
    expect(lines[0]).toBe("day,rows,unique_rooms,changed,change_rate");
    expect(lines[lines.length - 1]).toBe(",1,1,1,1");
  });

  it("emits every table file once", () => {
    expect(reportTables(samplePayload()).map((t) => t.filename)).toEqual([
      "summary_kpis.csv",
      "summary_by_day.csv",
      "summary_by_room_type.csv",
      "summary_by_hk_after.csv",
      "summary_by_user.csv",
      "summary_hsk_transition_matrix.csv",
      "room_usage_kpis.csv",
      "room_usage_by_room_type.csv",
      "room_usage_top_rooms.csv",
      "room_usage_by_feature.csv",
      "username_room_rotation_uniqueness.csv",
    ]);
  });
});

describe("html report", () => {
  it("renders sections in order with chart references", () => {
    const html = renderReportHtml(samplePayload(), "hsk_report_test");
    expect(html.startsWith('<!doctype html>\n<html lang="en">')).toBe(true);
    expect(html).toContain("<title>Weekly HSK</title>");
    expect(html).toContain('<span class="pill">hsk_report_test</span>');

    const hsk = html.indexOf("<h2>Housekeeping Change Log</h2>");
    const usage = html.indexOf("<h2>Room Usage</h2>");
    const rotation = html.indexOf('<h3 id="rotation">Room Rotation by Username</h3>');
    expect(hsk).toBeGreaterThan(-1);
    expect(usage).toBeGreaterThan(hsk);
    expect(rotation).toBeGreaterThan(usage);

    expect(html).toContain('src="hsk_changes_by_day.png"');
    expect(html).toContain('src="room_usage_top_features.png"');
    expect(html).toContain("No rotation chart generated.");
    expect(html).toContain("No users met the minimum activity threshold for rotation analysis.");
  });

  it("escapes data values", () => {
    const payload = assembleReport(
      {
        housekeeping: hskFacts(["101,King,VC,Dirty,Clean,Ann,Bob,<script>alert(1)</script>,01/05/2025 08:00"]),
        roomUsage: [],
        generatedAt: GENERATED_AT,
      },
      resolveConfig()
    );
    const html = renderReportHtml(payload, "run");
    expect(html).not.toContain("<script>alert(1)</script>");
    expect(html).toContain("&lt;script&gt;alert(1)&lt;/script&gt;");
    expect(html).toContain("No rows.");
  });

  it("shows empty states when nothing was loaded", () => {
    const payload = assembleReport({ housekeeping: [], roomUsage: [], generatedAt: GENERATED_AT }, resolveConfig());
    const html = renderReportHtml(payload, "run");
    expect(html).toContain("No notable items.");
    expect(html).toContain("No charts generated.");
    expect(html).toContain("No rotation data available.");
  });
});

describe("charts", () => {
  const spec: ChartSpec = {
    id: "t",
    title: "Top closing housekeepers",
    filename: "t.png",
    section: "housekeeping",
    value_label: "changed",
    data: [
      { label: "Bob & Co", value: 2 },
      { label: "A very long housekeeper name here", value: 1 / 3 },
    ],
  };

  it("renders a standalone document", () => {
    const svg = renderChartSvg(spec);
    expect(svg.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<svg')).toBe(true);
    expect(svg).toContain('height="108"');
    expect(svg).toContain(">Top closing housekeepers</text>");
    expect(svg).toContain(">changed</text>");
  });

  it("scales bars to the largest value and escapes labels", () => {
    const svg = renderChartSvg(spec);
    expect(svg).toContain('width="490"');
    expect(svg).toContain(">Bob &amp; Co</text>");
    expect(svg).toContain(">A very long housekeeper n…</text>");
    expect(svg).toContain(">0.333</text>");
  });

  it("rasterizes to a PNG at the drawing size", () => {
    const png = renderChartPng(spec);
    expect([...png.subarray(0, 8)]).toEqual([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
    expect(png.readUInt32BE(16)).toBe(760);
    expect(png.readUInt32BE(20)).toBe(108);
  });
});
