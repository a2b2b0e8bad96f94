import type { ChartSection, ChartSpec, ReportPayload } from "@/lib/report/assemble";
import { reportTables, type DataTable, type ReportTableName } from "@/lib/report/tables";
import DataTableView from "./DataTableView";
import ExecNotes from "./ExecNotes";
import KpiCards from "./KpiCards";
import RotationCallouts from "./RotationCallouts";

function ChartImage({ chart }: { chart: ChartSpec }) {
  return (
    <figure className="chart">
      <img src={chart.filename} alt={chart.title} loading="lazy" />
      <figcaption>{chart.title}</figcaption>
    </figure>
  );
}

function ChartsGrid({ charts }: { charts: ChartSpec[] }) {
  if (charts.length === 0) return <p className="muted">No charts generated.</p>;
  return (
    <div className="grid">
      {charts.map((c) => (
        <div className="span-6" key={c.id}>
          <ChartImage chart={c} />
        </div>
      ))}
    </div>
  );
}

function TableCard({ caption, table, maxRows }: { caption: string; table: DataTable; maxRows?: number }) {
  return (
    <div className="card span-12">
      <div className="caption">{caption}</div>
      <DataTableView table={table} maxRows={maxRows} />
    </div>
  );
}

export default function ReportDocument({
  payload,
  outDirName,
  css,
}: {
  payload: ReportPayload;
  outDirName: string;
  css: string;
}) {
  const tables = new Map(reportTables(payload).map((t) => [t.name, t] as const));
  const card = (name: ReportTableName, maxRows?: number) => {
    const t = tables.get(name);
    return t ? <TableCard caption={t.caption} table={t.table} maxRows={maxRows} /> : null;
  };
  const chartsFor = (section: ChartSection) => payload.charts.filter((c) => c.section === section);
  const rotationChart = chartsFor("rotation")[0];
  const { config, rotation } = payload;

  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{payload.title}</title>
        <style dangerouslySetInnerHTML={{ __html: css }} />
      </head>
      <body>
        <div className="wrap">
          <h1>{payload.title}</h1>
          <div className="sub">
            {`Generated ${payload.generated_at} • Folder: `}
            <span className="pill">{outDirName}</span>
          </div>

          <div className="card soft">
            <div className="caption">What this report is</div>
            <div className="muted">
              A snapshot of housekeeping status changes and room usage: volume, real changes (Before ≠ After), who
              closed work, and which room types and features are getting used.
            </div>
          </div>

          <h2>Housekeeping Change Log</h2>
          <h3>KPIs</h3>
          <KpiCards kpis={payload.housekeeping.kpis} />
          <div className="card">
            <div className="caption">Executive notes</div>
            <ExecNotes notes={payload.housekeeping.exec_notes} />
          </div>
          <h3>Charts</h3>
          <ChartsGrid charts={chartsFor("housekeeping")} />
          <h3>Summaries</h3>
          <div className="grid stack">
            {card("by_day")}
            {card("by_room_type")}
            {card("by_hk_after")}
            {card("by_user")}
            {card("transition_matrix")}
          </div>

          <div className="hr" />

          <h2>Room Usage</h2>
          <h3>KPIs</h3>
          <KpiCards kpis={payload.room_usage.kpis} />
          <div className="card">
            <div className="caption">Executive notes</div>
            <ExecNotes notes={payload.room_usage.exec_notes} />
          </div>
          <h3>Charts</h3>
          <ChartsGrid charts={chartsFor("room_usage")} />
          <h3>Summaries</h3>
          <div className="grid">
            {card("room_usage_by_room_type")}
            {card("top_rooms")}
            {card("by_feature")}
          </div>

          <div className="hr" />

          <h3 id="rotation">Room Rotation by Username</h3>
          <div className="card">
            <div className="caption">How to read this</div>
            <p className="muted">
              Metric: <b>unique_rooms / total_actions</b>. Lower values mean less rotation (more repetition). Only
              users with <b>{`${config.calloutMinActions}+ actions`}</b> should be considered real signals.{" "}
              <b>room_randomness</b> (1 − Herfindahl index of room visits) is reported beside it and rewards an even
              spread across rooms.
            </p>
          </div>
          <div className="grid">
            <div className="card span-12">
              {rotationChart ? (
                <ChartImage chart={rotationChart} />
              ) : (
                <p className="muted">No rotation chart generated.</p>
              )}
            </div>
            <div className="card span-12">
              <RotationCallouts
                records={rotation.uniqueness_by_user}
                callouts={rotation.callouts}
                minActions={config.calloutMinActions}
                bands={config.bands}
              />
            </div>
            {card("uniqueness_by_user", 50)}
          </div>
        </div>
      </body>
    </html>
  );
}
