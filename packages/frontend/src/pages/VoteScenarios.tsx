import { useMemo } from 'react';
import { useNavigate } from 'react-router-dom';
import {
  useCastVote,
  useClearMyVotes,
  useMyVotes,
  useRetractVote,
  useScenarios,
  useSettings,
} from '../hooks';
import { useVoterStore } from '../stores/voter.store';
import { ScoreSelector } from '../components/ScoreSelector';
import { EmptyScenarios, LoadingSpinner } from '../components/ui';
import { orderForVoter } from '../utils/voting-order';
import { describeScenario } from '../utils/results-view';
import { SCORE_LABELS, type Score } from '../types';

export function VoteScenarios() {
  const navigate = useNavigate();
  const token = useVoterStore((s) => s.token);
  const name = useVoterStore((s) => s.name);
  const { data: scenarios, isLoading, error } = useScenarios();
  const { data: myVotes } = useMyVotes(token);
  // One vote per scenario unless the server says otherwise
  const oneVoteEach = useSettings().data?.preventDuplicateVotes ?? true;
  const castVote = useCastVote();
  const retractVote = useRetractVote();
  const clearMyVotes = useClearMyVotes();

  const ordered = useMemo(() => orderForVoter(scenarios ?? [], token), [scenarios, token]);

  // Latest vote wins when repeat votes are allowed
  const myScores = useMemo(() => {
    const scores = new Map<number, Score>();
    for (const vote of myVotes ?? []) {
      scores.set(vote.scenarioId, vote.score);
    }
    return scores;
  }, [myVotes]);

  if (isLoading) return <LoadingSpinner label="Loading scenarios" />;

  if (error) {
    return (
      <p role="alert" className="text-sm text-danger">
        Could not load scenarios: {error.message}
      </p>
    );
  }

  if (ordered.length === 0) {
    return <EmptyScenarios onSubmit={() => navigate('/submit')} />;
  }

  const busy = castVote.isPending || retractVote.isPending || clearMyVotes.isPending;

  return (
    <div className="space-y-4">
      <div className="flex items-center justify-between">
        <div>
          <h2 className="text-lg font-semibold text-surface-900">Vote on Scenarios</h2>
          <p className="text-sm text-surface-500">
            You have rated {myScores.size} of {ordered.length} scenarios.
          </p>
          <p className="text-xs text-surface-400">
            Switching from group to individual voting? Use "Vote as someone new" at the top.
          </p>
        </div>
        <button
          type="button"
          className="btn-secondary"
          disabled={busy || myScores.size === 0}
          onClick={() => clearMyVotes.mutate(token)}
        >
          Clear all my votes
        </button>
      </div>

      <ul className="space-y-4">
        {ordered.map((scenario) => {
          const current = myScores.get(scenario.id) ?? null;
          return (
            <li key={scenario.id} className="card p-5">
              <p className="text-sm text-surface-900 mb-3">{describeScenario(scenario)}</p>
              <ScoreSelector
                scenarioId={scenario.id}
                value={current}
                disabled={busy || (oneVoteEach && current !== null)}
                onSelect={(score) =>
                  castVote.mutate({
                    scenarioId: scenario.id,
                    score,
                    voterToken: token,
                    voterName: name.trim() || undefined,
                  })
                }
              />
              {current !== null && (
                <div className="mt-3 flex items-center justify-between text-sm">
                  <span className="text-surface-600">
                    Your rating: {current} - {SCORE_LABELS[current]}
                  </span>
                  <button
                    type="button"
                    className="text-accent-700 hover:underline"
                    disabled={busy}
                    onClick={() => retractVote.mutate({ scenarioId: scenario.id, voterToken: token })}
                  >
                    Remove vote
                  </button>
                </div>
              )}
            </li>
          );
        })}
      </ul>
    </div>
  );
}
