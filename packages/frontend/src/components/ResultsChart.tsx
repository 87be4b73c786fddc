import type { ResultsRow } from '../utils/results-view';

interface ResultsChartProps {
  rows: ResultsRow[];
}

export function ResultsChart({ rows }: ResultsChartProps) {
  if (rows.length === 0) {
    return <p className="text-sm text-surface-500">No votes have been cast yet.</p>;
  }

  return (
    <ul aria-label="Average rating per scenario" className="space-y-2">
      {rows.map((row) => (
        <li key={row.scenarioId} className="flex items-center gap-3">
          <span className="w-28 shrink-0 text-sm font-medium text-surface-700">{row.label}</span>
          <div className="flex-1 h-5 bg-surface-100 rounded">
            <div
              data-testid={`mean-bar-${row.scenarioId}`}
              className="h-5 bg-accent-500 rounded"
              style={{ width: `${row.barPercent}%` }}
            />
          </div>
          <span className="w-12 text-right text-sm tabular-nums text-surface-900">{row.meanLabel}</span>
        </li>
      ))}
    </ul>
  );
}

export function HistogramBars({ row }: { row: ResultsRow }) {
  return (
    <dl aria-label={`Vote breakdown for ${row.label}`} className="space-y-1">
      {row.histogram.map((bar) => (
        <div key={bar.score} className="flex items-center gap-2 text-xs">
          <dt className="w-44 shrink-0 text-surface-600">{bar.label}</dt>
          <dd className="flex-1 flex items-center gap-2">
            <span className="h-3 bg-accent-300 rounded" style={{ width: `${bar.percent}%` }} />
            <span className="tabular-nums text-surface-700">{bar.count}</span>
          </dd>
        </div>
      ))}
    </dl>
  );
}
