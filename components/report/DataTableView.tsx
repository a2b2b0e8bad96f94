import type { DataTable } from "@/lib/report/tables";
import { formatCell } from "./KpiCards";

export default function DataTableView({ table, maxRows = 200 }: { table: DataTable; maxRows?: number }) {
  if (table.rows.length === 0) return <p className="muted">No rows.</p>;

  const shown = table.rows.slice(0, maxRows);
  return (
    <div className="table-wrap">
      <table>
        <thead>
          <tr>
            {table.headers.map((h, i) => (
              <th key={i}>{h}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {shown.map((row, r) => (
            <tr key={r}>
              {row.map((cell, c) => (
                <td key={c} className={typeof cell === "number" ? "num" : undefined}>
                  {formatCell(cell)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
      {table.rows.length > shown.length && (
        <p className="muted">
          Showing first {shown.length} of {table.rows.length} rows; the CSV has all of them.
        </p>
      )}
    </div>
  );
}
