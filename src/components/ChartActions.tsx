import React from "react";
import type { FilteredView } from "../types";
import { errorMessage } from "../lib/errors";
import {
  EXPORT_MIME,
  downloadBytes,
  exportFileName,
  toCSV,
  toImage,
  toSpreadsheet,
  type ExportKind,
} from "../lib/export";

type Props = {
  view: FilteredView;
  chartRef: React.RefObject<HTMLDivElement>;
  /** `yyyy-MM-dd` stamped into the file names. */
  today: string;
};

const ChartActions: React.FC<Props> = ({ view, chartRef, today }) => {
  const [busy, setBusy] = React.useState<ExportKind | null>(null);
  const [error, setError] = React.useState<string | null>(null);

  const bytesFor = async (kind: ExportKind): Promise<Uint8Array> => {
    if (kind === "csv") return toCSV(view);
    if (kind === "xlsx") return toSpreadsheet(view);
    const node = chartRef.current;
    if (!node) throw new Error("Chart is not on screen");
    return toImage(node);
  };

  const save = async (kind: ExportKind) => {
    setBusy(kind);
    setError(null);
    try {
      const bytes = await bytesFor(kind);
      downloadBytes(bytes, exportFileName(view.category, kind, today), EXPORT_MIME[kind]);
    } catch (err) {
      console.error(`Export (${kind}) failed`, err);
      setError(errorMessage(err));
    } finally {
      setBusy(null);
    }
  };

  const noMetrics = !view.columns.length;

  return (
    <div className="card">
      <div className="card-header">Save Your Work</div>
      <div className="card-body">
        <details style={{ marginBottom: 10 }}>
          <summary>How to Save</summary>
          <ul className="muted" style={{ margin: "8px 0 0", paddingLeft: 18 }}>
            <li><b>CSV</b>: the table as a plain text file.</li>
            <li><b>Excel</b>: the table as a formatted workbook.</li>
            <li><b>Chart</b>: the chart as a PNG image.</li>
          </ul>
        </details>
        <div className="chart-actions" style={{ display: "flex", gap: 8, flexWrap: "wrap" }}>
          <button className="btn btn-secondary" onClick={() => void save("csv")} disabled={busy !== null}
            title="Download the table as a CSV file.">
            Save as CSV
          </button>
          <button className="btn btn-secondary" onClick={() => void save("xlsx")} disabled={busy !== null}
            title="Download the table as an Excel file.">
            Save as Excel
          </button>
          <button className="btn btn-secondary" onClick={() => void save("png")} disabled={busy !== null || noMetrics}
            title="Download the chart as an image.">
            Save Chart
          </button>
        </div>
        {error && (
          <div className="alert" style={{ marginTop: 12 }} role="alert" aria-live="polite">{error}</div>
        )}
      </div>
    </div>
  );
};

export default ChartActions;
