// Mirrors of the backend API payloads

export type Score = 1 | 2 | 3 | 4 | 5;

export const SCORES: readonly Score[] = [1, 2, 3, 4, 5];

export const SCORE_LABELS: Record<Score, string> = {
  1: 'Clearly Unacceptable',
  2: 'Somewhat Unacceptable',
  3: 'Neutral/Borderline',
  4: 'Somewhat Acceptable',
  5: 'Clearly Acceptable',
};

export interface Scenario {
  id: number;
  text: string;
  submittedBy: string | null;
  submittedAt: string;
}

export interface Vote {
  scenarioId: number;
  score: Score;
  voterToken: string;
  voterName: string | null;
  castAt: string;
}

export type Histogram = Record<Score, number>;

export interface Summary {
  scenarioId: number;
  count: number;
  mean: number;
  histogram: Histogram;
}

export interface Participation {
  voterCount: number;
  voters: string[];
}

export interface ResultsResponse {
  summaries: Record<number, Summary>;
  participation: Participation;
}

export interface ClientSettings {
  maxScenarioLength: number;
  preventDuplicateVotes: boolean;
  resetEnabled: boolean;
}
