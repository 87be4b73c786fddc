import { useMemo, useState, type FormEvent } from 'react';
import { useResetAll, useResults, useScenarios, useSettings } from '../hooks';
import { ResultsChart, HistogramBars } from '../components/ResultsChart';
import { EmptyState, LoadingSpinner } from '../components/ui';
import { buildResultsView } from '../utils/results-view';

export function Results() {
  const results = useResults();
  const scenarios = useScenarios();
  const resetEnabled = useSettings().data?.resetEnabled ?? false;

  const view = useMemo(() => {
    if (!results.data || !scenarios.data) return null;
    return buildResultsView(scenarios.data, results.data.summaries, results.data.participation);
  }, [results.data, scenarios.data]);

  if (results.isLoading || scenarios.isLoading) return <LoadingSpinner label="Loading results" />;

  const error = results.error ?? scenarios.error;
  if (error || !view) {
    return (
      <p role="alert" className="text-sm text-danger">
        Could not load results{error ? `: ${error.message}` : ''}
      </p>
    );
  }

  if (view.rows.length === 0) {
    return <EmptyState title="Nothing to show yet" description="Results appear once scenarios are submitted." />;
  }

  return (
    <div className="space-y-8">
      <section className="card p-6">
        <h2 className="text-lg font-semibold text-surface-900 mb-4">Average Acceptability (1-5)</h2>
        <ResultsChart rows={view.ranked} />
      </section>

      <section className="card p-6">
        <h2 className="text-lg font-semibold text-surface-900 mb-4">Ranking</h2>
        <table className="w-full text-sm">
          <thead>
            <tr className="text-left text-surface-500">
              <th className="py-2 pr-3">#</th>
              <th className="py-2 pr-3">Scenario</th>
              <th className="py-2 pr-3">Submitted by</th>
              <th className="py-2 pr-3 text-right">Votes</th>
              <th className="py-2 text-right">Mean</th>
            </tr>
          </thead>
          <tbody>
            {view.rows.map((row, index) => (
              <tr key={row.scenarioId} className="border-t border-surface-100 align-top">
                <td className="py-2 pr-3 tabular-nums">{index + 1}</td>
                <td className="py-2 pr-3">
                  <span className="font-medium">{row.label}</span>: {row.text}
                  {row.count > 0 && (
                    <details className="mt-2">
                      <summary className="cursor-pointer text-xs text-surface-500">Vote breakdown</summary>
                      <div className="mt-2">
                        <HistogramBars row={row} />
                      </div>
                    </details>
                  )}
                </td>
                <td className="py-2 pr-3 text-surface-600">{row.submittedBy ?? 'Anonymous'}</td>
                <td className="py-2 pr-3 text-right tabular-nums">{row.count}</td>
                <td className="py-2 text-right tabular-nums">{row.meanLabel}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </section>

      <section className="card p-6">
        <h2 className="text-lg font-semibold text-surface-900 mb-1">Participation</h2>
        <p className="text-sm text-surface-600 mb-2">
          {view.participation.label} ({view.totalVotes} votes in total)
        </p>
        {view.participation.voters.length > 0 && (
          <p className="text-sm text-surface-800">{view.participation.voters.join(', ')}</p>
        )}
      </section>

      {resetEnabled && <ResetPanel />}
    </div>
  );
}

function ResetPanel() {
  const [password, setPassword] = useState('');
  const resetAll = useResetAll();

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault();
    if (!password) return;
    resetAll.mutate(password, { onSuccess: () => setPassword('') });
  };

  return (
    <details className="card p-6">
      <summary className="cursor-pointer text-sm font-medium text-surface-700">Instructor: reset all data</summary>
      <form onSubmit={handleSubmit} className="mt-4 flex items-end gap-3">
        <label className="flex flex-col text-xs font-medium text-surface-600">
          Admin password
          <input
            type="password"
            value={password}
            onChange={(e) => setPassword(e.target.value)}
            className="input mt-1"
          />
        </label>
        <button type="submit" className="btn-danger" disabled={!password || resetAll.isPending}>
          Reset
        </button>
      </form>
    </details>
  );
}
