import type { RotationBands } from "@/lib/analytics/config";
import type { RotationRecord } from "@/lib/domain/types";

const edge = (n: number) => n.toFixed(2);

export function BandLegend({ bands }: { bands: RotationBands }) {
  return (
    <p className="muted">
      Quick read: <b>&lt;{edge(bands.low)}</b> very low • <b>{`${edge(bands.low)}–${edge(bands.moderate)}`}</b> low •{" "}
      <b>{`${edge(bands.moderate)}–${edge(bands.high)}`}</b> moderate • <b>≥{edge(bands.high)}</b> high.
    </p>
  );
}

export default function RotationCallouts({
  records,
  callouts,
  minActions,
  bands,
}: {
  records: RotationRecord[];
  callouts: RotationRecord[];
  minActions: number;
  bands: RotationBands;
}) {
  if (records.length === 0) return <p className="muted">No rotation data available.</p>;
  if (callouts.length === 0) {
    return <p className="muted">No users met the minimum activity threshold for rotation analysis.</p>;
  }

  return (
    <div className="card">
      <div className="caption">Rotation issues (likely not assigning unique rooms)</div>
      <p className="muted">
        Metric: <b>unique_rooms / total_actions</b>. Lower means repeatedly working the same rooms instead of
        rotating inventory. Only users with <b>{`${minActions}+ actions`}</b> are evaluated here.
      </p>
      <ul className="callouts">
        {callouts.map((r) => (
          <li key={r.username}>
            <b>{r.username}</b>
            {`: ${r.unique_rooms} unique rooms / ${r.total_actions} actions = `}
            <b>{r.room_uniqueness_rate.toFixed(3)}</b>
            {` → ${r.rotation_quality}`}
          </li>
        ))}
      </ul>
      <BandLegend bands={bands} />
    </div>
  );
}
