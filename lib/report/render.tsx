import { Resvg } from "@resvg/resvg-js";
import { renderToStaticMarkup } from "react-dom/server";
import BarChart from "@/components/report/BarChart";
import ReportDocument from "@/components/report/ReportDocument";
import type { ChartSpec, ReportPayload } from "./assemble";

// React escapes every text child and attribute value; the stylesheet is the only raw HTML
export const REPORT_CSS = `
:root { --ink:#111827; --muted:#6b7280; --line:#e5e7eb; --soft:#f3f4f6; --accent:#2563eb; }
* { box-sizing: border-box; }
body { margin:0; font-family: "Segoe UI", Arial, sans-serif; color: var(--ink); background:#fafafa; }
.wrap { max-width: 1200px; margin: 0 auto; padding: 24px; }
h1 { margin: 0 0 4px; font-size: 26px; }
h2 { margin-top: 32px; border-bottom: 2px solid var(--line); padding-bottom: 6px; }
.sub { color: var(--muted); margin-bottom: 16px; }
.pill { background: var(--soft); border-radius: 999px; padding: 2px 10px; font-family: monospace; }
.card { background:#fff; border:1px solid var(--line); border-radius: 10px; padding: 14px; margin: 12px 0; }
.card.soft { background: var(--soft); }
.caption { font-weight: 600; margin-bottom: 8px; }
.muted { color: var(--muted); }
.kpi-wrap { display:flex; flex-wrap:wrap; gap: 10px; }
.kpi-card { background:#fff; border:1px solid var(--line); border-radius: 10px; padding: 10px 14px; min-width: 160px; }
.kpi-label { color: var(--muted); font-size: 12px; }
.kpi { font-size: 20px; font-weight: 600; }
.grid { display:grid; grid-template-columns: repeat(12, 1fr); gap: 12px; }
.span-6 { grid-column: span 6; }
.span-12 { grid-column: span 12; }
.chart { margin: 0; }
.chart img { max-width: 100%; border:1px solid var(--line); border-radius: 8px; background:#fff; }
.chart figcaption { color: var(--muted); font-size: 12px; margin-top: 4px; }
.table-wrap { overflow-x: auto; }
table { border-collapse: collapse; width: 100%; font-size: 13px; }
th, td { border-bottom: 1px solid var(--line); padding: 6px 8px; text-align: left; }
th { background: var(--soft); }
td.num { text-align: right; font-variant-numeric: tabular-nums; }
.hr { height: 1px; background: var(--line); margin: 32px 0; }
@media (max-width: 800px) { .span-6 { grid-column: span 12; } }
`;

export function renderReportHtml(payload: ReportPayload, outDirName: string): string {
  return (
    "<!doctype html>\n" +
    renderToStaticMarkup(<ReportDocument payload={payload} outDirName={outDirName} css={REPORT_CSS} />)
  );
}

export function renderChartSvg(spec: ChartSpec): string {
  return '<?xml version="1.0" encoding="UTF-8"?>\n' + renderToStaticMarkup(<BarChart spec={spec} />);
}

// Charts ship as PNG; the SVG above is only the drawing surface
export function renderChartPng(spec: ChartSpec): Buffer {
  const resvg = new Resvg(renderChartSvg(spec), {
    background: "#ffffff",
    fitTo: { mode: "original" },
    font: { loadSystemFonts: true, defaultFontFamily: "Arial" },
  });
  return resvg.render().asPng();
}
