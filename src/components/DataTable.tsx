import React from "react";
import type { FilteredView } from "../types";
import { formatValue } from "../lib/kpi";
import { viewHeader } from "../lib/export";

type Props = { view: FilteredView };

const DataTable: React.FC<Props> = ({ view }) => {
  const header = React.useMemo(() => viewHeader(view), [view]);

  return (
    <div className="preview-container table-wrap">
      <div className="table-header">
        <span>Data Table</span>
        <span className="muted">{view.dates.length} months</span>
      </div>
      <details style={{ padding: "10px 14px", borderBottom: "1px solid var(--border)" }}>
        <summary>What’s in the Table?</summary>
        <div className="muted" style={{ marginTop: 6 }}>
          All the raw data for your selected metrics and time period. Each row is a month, and each column is a metric.
        </div>
      </details>
      <div className="table-scroll">
        <table>
          <thead>
            <tr>
              {header.map((c) => (
                <th key={c}>{c}</th>
              ))}
            </tr>
          </thead>
          <tbody>
            {view.dates.length === 0 ? (
              <tr>
                <td colSpan={header.length} style={{ textAlign: "center", color: "#9ca3af", padding: 18 }}>
                  No rows to display
                </td>
              </tr>
            ) : (
              view.dates.map((date, row) => (
                <tr key={`${date}-${row}`}>
                  <td>{date}</td>
                  {view.columns.map((metric) => (
                    <td key={metric}>{formatCell(view.values[metric]?.[row])}</td>
                  ))}
                </tr>
              ))
            )}
          </tbody>
        </table>
      </div>
    </div>
  );
};

function formatCell(value: number | undefined): string {
  return value === undefined ? "" : formatValue(value);
}

export default DataTable;
