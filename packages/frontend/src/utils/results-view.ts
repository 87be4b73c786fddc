import { SCORES, SCORE_LABELS } from '../types';
import type { Participation, Scenario, Score, Summary } from '../types';

export const MAX_SCORE = 5;

export interface HistogramBar {
  score: Score;
  label: string;
  count: number;
  /** Share of this scenario's votes, 0-100, rounded to a whole percent */
  percent: number;
}

export interface ResultsRow {
  scenarioId: number;
  label: string;
  text: string;
  submittedBy: string | null;
  count: number;
  mean: number;
  meanLabel: string;
  /** Width of the mean bar as a share of the maximum score, 0-100 */
  barPercent: number;
  histogram: HistogramBar[];
}

export interface ResultsView {
  rows: ResultsRow[];
  /** Rows with at least one vote, in ranking order; what the chart plots */
  ranked: ResultsRow[];
  totalVotes: number;
  participation: {
    voterCount: number;
    voters: string[];
    label: string;
  };
}

export function scenarioLabel(scenario: Pick<Scenario, 'id'>): string {
  return `Scenario ${scenario.id}`;
}

/**
 * "Scenario N: text (by name)", or without the suffix for anonymous entries.
 */
export function describeScenario(scenario: Scenario): string {
  const base = `${scenarioLabel(scenario)}: ${scenario.text}`;
  return scenario.submittedBy ? `${base} (by ${scenario.submittedBy})` : base;
}

function emptySummary(scenarioId: number): Summary {
  return { scenarioId, count: 0, mean: 0, histogram: { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 } };
}

function toRow(scenario: Scenario, summary: Summary): ResultsRow {
  return {
    scenarioId: scenario.id,
    label: scenarioLabel(scenario),
    text: scenario.text,
    submittedBy: scenario.submittedBy,
    count: summary.count,
    mean: summary.mean,
    meanLabel: summary.count > 0 ? summary.mean.toFixed(2) : 'No votes',
    barPercent: summary.count > 0 ? Math.round((summary.mean / MAX_SCORE) * 1000) / 10 : 0,
    histogram: SCORES.map((score) => {
      const count = summary.histogram[score];
      return {
        score,
        label: `${score} - ${SCORE_LABELS[score]}`,
        count,
        percent: summary.count > 0 ? Math.round((count / summary.count) * 100) : 0,
      };
    }),
  };
}

/**
 * Shape the results payload for display.
 *
 * Rows are ordered by mean descending; scenarios nobody has voted on go last.
 * Ties keep submission order. A scenario missing from `summaries` (submitted
 * after the results were fetched) is shown with zero votes.
 */
export function buildResultsView(
  scenarios: readonly Scenario[],
  summaries: Readonly<Record<number, Summary | undefined>>,
  participation: Participation
): ResultsView {
  const rows = scenarios
    .map((scenario) => toRow(scenario, summaries[scenario.id] ?? emptySummary(scenario.id)))
    .sort((a, b) => {
      const aVoted = a.count > 0;
      const bVoted = b.count > 0;
      if (aVoted !== bVoted) return aVoted ? -1 : 1;
      return b.mean - a.mean || a.scenarioId - b.scenarioId;
    });

  const voterCount = participation.voterCount;

  return {
    rows,
    ranked: rows.filter((row) => row.count > 0),
    totalVotes: rows.reduce((sum, row) => sum + row.count, 0),
    participation: {
      voterCount,
      voters: participation.voters,
      label: voterCount === 1 ? '1 voter so far' : `${voterCount} voters so far`,
    },
  };
}
