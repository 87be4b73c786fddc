import { SCORES, SCORE_LABELS, type Score } from '../types';

interface ScoreSelectorProps {
  scenarioId: number;
  value: Score | null;
  onSelect: (score: Score) => void;
  disabled?: boolean;
}

/**
 * Radio group for the 1-5 acceptability scale.
 */
export function ScoreSelector({ scenarioId, value, onSelect, disabled = false }: ScoreSelectorProps) {
  const name = `score-${scenarioId}`;

  return (
    <fieldset className="flex flex-col gap-1" disabled={disabled}>
      <legend className="sr-only">Rate scenario {scenarioId}</legend>
      {SCORES.map((score) => (
        <label
          key={score}
          className={`flex items-center gap-2 px-3 py-1.5 rounded-md text-sm cursor-pointer transition-colors ${
            value === score ? 'bg-accent-100 text-accent-800 font-medium' : 'hover:bg-surface-100 text-surface-700'
          }`}
        >
          <input
            type="radio"
            name={name}
            value={score}
            checked={value === score}
            onChange={() => onSelect(score)}
            className="accent-accent-600"
          />
          {score} - {SCORE_LABELS[score]}
        </label>
      ))}
    </fieldset>
  );
}
