import type { Cell } from "@/lib/report/tables";

export function formatCell(v: Cell | undefined): string {
  if (v === null || v === undefined) return "—";
  if (typeof v === "boolean") return v ? "yes" : "no";
  return String(v);
}

export default function KpiCards({ kpis }: { kpis: Record<string, Cell> | null }) {
  const entries = kpis ? Object.entries(kpis) : [];
  if (entries.length === 0) return <p className="muted">No KPIs available.</p>;

  return (
    <div className="kpi-wrap">
      {entries.map(([label, value]) => (
        <div className="kpi-card" key={label}>
          <div className="kpi-label">{label}</div>
          <div className="kpi">{formatCell(value)}</div>
        </div>
      ))}
    </div>
  );
}
