import type { ChartSpec } from "@/lib/report/assemble";

const ROW_H = 26;
const TOP = 40;
const LABEL_W = 190;
const VALUE_W = 64;

function truncate(label: string, max = 26): string {
  return label.length > max ? label.slice(0, max - 1) + "…" : label;
}

function formatValue(v: number): string {
  return String(Math.round(v * 1000) / 1000);
}

// Horizontal bar chart as a standalone SVG document
export default function BarChart({ spec, width = 760 }: { spec: ChartSpec; width?: number }) {
  const height = TOP + spec.data.length * ROW_H + 16;
  const barArea = width - LABEL_W - VALUE_W - 16;
  const max = spec.data.reduce((m, p) => Math.max(m, p.value), 0) || 1;

  return (
    <svg
      xmlns="http://www.w3.org/2000/svg"
      width={width}
      height={height}
      viewBox={`0 0 ${width} ${height}`}
      role="img"
      aria-label={spec.title}
    >
      <rect x="0" y="0" width={width} height={height} fill="#ffffff" />
      <text x="16" y="24" fontFamily="Segoe UI, Arial, sans-serif" fontSize="15" fontWeight="600" fill="#1f2937">
        {spec.title}
      </text>
      <text
        x={width - 16}
        y="24"
        textAnchor="end"
        fontFamily="Segoe UI, Arial, sans-serif"
        fontSize="12"
        fill="#6b7280"
      >
        {spec.value_label}
      </text>
      {spec.data.map((p, i) => {
        const y = TOP + i * ROW_H;
        const w = Math.max(1, Math.round((p.value / max) * barArea));
        return (
          <g key={`${p.label}-${i}`}>
            <text
              x={LABEL_W - 8}
              y={y + ROW_H / 2 + 4}
              textAnchor="end"
              fontFamily="Segoe UI, Arial, sans-serif"
              fontSize="12"
              fill="#374151"
            >
              {truncate(p.label)}
            </text>
            <rect x={LABEL_W} y={y + 4} width={w} height={ROW_H - 8} rx="3" fill="#2563eb" />
            <text
              x={LABEL_W + w + 6}
              y={y + ROW_H / 2 + 4}
              fontFamily="Segoe UI, Arial, sans-serif"
              fontSize="12"
              fill="#111827"
            >
              {formatValue(p.value)}
            </text>
          </g>
        );
      })}
    </svg>
  );
}
