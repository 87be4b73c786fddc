import { useState, type FormEvent } from 'react';
import { useScenarios, useSettings, useSubmitScenario } from '../hooks';
import { useVoterStore } from '../stores/voter.store';
import { describeScenario } from '../utils/results-view';
import { EmptyState, LoadingSpinner } from '../components/ui';

export function SubmitScenario() {
  const [text, setText] = useState('');
  const name = useVoterStore((s) => s.name);
  const { data: scenarios, isLoading, error } = useScenarios();
  const submitScenario = useSubmitScenario();
  // Unknown until settings load; the server enforces the limit either way
  const maxLength = useSettings().data?.maxScenarioLength;

  const tooLong = maxLength !== undefined && text.length > maxLength;
  const canSubmit = text.trim().length > 0 && !tooLong && !submitScenario.isPending;

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault();
    if (!canSubmit) return;
    submitScenario.mutate(
      { text, submittedBy: name.trim() || undefined },
      { onSuccess: () => setText('') }
    );
  };

  return (
    <div className="space-y-8">
      <section className="card p-6">
        <h2 className="text-lg font-semibold text-surface-900 mb-1">Submit a Scenario</h2>
        <p className="text-sm text-surface-500 mb-4">
          Describe a situation where someone uses AI. Keep it short enough for classmates to read quickly.
        </p>
        <form onSubmit={handleSubmit} className="space-y-3">
          <label htmlFor="scenario-text" className="sr-only">
            Scenario description
          </label>
          <textarea
            id="scenario-text"
            value={text}
            onChange={(e) => setText(e.target.value)}
            maxLength={maxLength}
            rows={4}
            placeholder="A student uses AI to summarize a reading before class..."
            className="input w-full"
          />
          <div className="flex items-center justify-between">
            <span data-testid="length-counter" className={`text-xs ${tooLong ? 'text-danger' : 'text-surface-400'}`}>
              {maxLength === undefined ? text.length : `${text.length}/${maxLength}`}
            </span>
            <button type="submit" className="btn-primary" disabled={!canSubmit}>
              {submitScenario.isPending ? 'Submitting...' : 'Submit Scenario'}
            </button>
          </div>
        </form>
      </section>

      <section>
        <h2 className="text-lg font-semibold text-surface-900 mb-3">Current Scenarios</h2>
        {isLoading ? (
          <LoadingSpinner label="Loading scenarios" />
        ) : error ? (
          <p role="alert" className="text-sm text-danger">
            Could not load scenarios: {error.message}
          </p>
        ) : !scenarios || scenarios.length === 0 ? (
          <EmptyState size="sm" title="No scenarios yet" description="Be the first to submit one." />
        ) : (
          <ul className="space-y-2">
            {scenarios.map((scenario) => (
              <li key={scenario.id} className="card px-4 py-3 text-sm text-surface-800">
                {describeScenario(scenario)}
              </li>
            ))}
          </ul>
        )}
      </section>
    </div>
  );
}
