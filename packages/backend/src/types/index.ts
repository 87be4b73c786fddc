// Ethics rating scale: 1 = clearly unacceptable, 5 = clearly acceptable
export const SCORES = [1, 2, 3, 4, 5] as const;

export type Score = (typeof SCORES)[number];

export type ScenarioId = number;

export interface Scenario {
  id: ScenarioId;
  text: string;
  submittedBy: string | null;
  submittedAt: string;
}

export interface Vote {
  scenarioId: ScenarioId;
  score: Score;
  voterToken: string;
  voterName: string | null;
  castAt: string;
}

export type Histogram = Record<Score, number>;

export interface Summary {
  scenarioId: ScenarioId;
  count: number;
  /** Rounded to two decimals; 0 when there are no votes */
  mean: number;
  histogram: Histogram;
}

export type SummaryMap = Record<ScenarioId, Summary>;

export interface Participation {
  voterCount: number;
  voters: string[];
}

export interface ResultsResponse {
  summaries: SummaryMap;
  participation: Participation;
}

export function isScore(value: number): value is Score {
  return Number.isInteger(value) && value >= 1 && value <= 5;
}

export interface ClientSettings {
  maxScenarioLength: number;
  preventDuplicateVotes: boolean;
  resetEnabled: boolean;
}
