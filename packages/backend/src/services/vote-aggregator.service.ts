import { ConflictError, NotFoundError, ValidationError } from '../lib/errors.js';
import type { VoteRepository } from '../storage/types.js';
import {
  SCORES,
  isScore,
  type Histogram,
  type Participation,
  type ScenarioId,
  type Summary,
  type SummaryMap,
  type Vote,
} from '../types/index.js';
import { normalizeDisplayName, type ScenarioStore } from './scenario-store.service.js';

export const MAX_VOTER_TOKEN_LENGTH = 128;

export interface VoteAggregatorOptions {
  preventDuplicateVotes: boolean;
  now?: () => Date;
}

function emptyHistogram(): Histogram {
  return { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
}

/**
 * Count, mean and per-score histogram over a scenario's votes.
 * Mean is rounded to two decimals and is 0 when nothing has been cast.
 */
export function summarizeVotes(scenarioId: ScenarioId, votes: readonly Vote[]): Summary {
  const histogram = emptyHistogram();
  let total = 0;

  for (const vote of votes) {
    histogram[vote.score] += 1;
    total += vote.score;
  }

  const count = votes.length;
  const mean = count === 0 ? 0 : Math.round((total / count) * 100) / 100;

  return { scenarioId, count, mean, histogram };
}

export class VoteAggregator {
  private readonly now: () => Date;

  constructor(
    private readonly votes: VoteRepository,
    private readonly scenarios: ScenarioStore,
    private readonly options: VoteAggregatorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get preventDuplicateVotes(): boolean {
    return this.options.preventDuplicateVotes;
  }

  async castVote(
    scenarioId: ScenarioId,
    score: number,
    voterToken: string,
    voterName?: string
  ): Promise<Vote> {
    if (!isScore(score)) {
      throw new ValidationError(
        `Score must be an integer between ${SCORES[0]} and ${SCORES[SCORES.length - 1]}`,
        { field: 'score', score }
      );
    }
    assertVoterToken(voterToken);
    const name = normalizeDisplayName(voterName, 'voterName');

    const scenario = await this.scenarios.get(scenarioId);

    const vote: Vote = {
      scenarioId,
      score,
      voterToken,
      voterName: name,
      castAt: this.now().toISOString(),
    };

    const inserted = await this.votes.insert(vote, { unique: this.options.preventDuplicateVotes });
    if (!inserted) {
      throw new ConflictError(`Voter has already voted on scenario ${scenarioId}`);
    }

    // A reset may have landed between the lookup and the insert, possibly
    // followed by a new scenario that reuses the id
    const current = await this.scenarios.find(scenarioId);
    if (!current || current.submittedAt !== scenario.submittedAt || current.text !== scenario.text) {
      await this.votes.deleteByScenarioAndVoter(scenarioId, voterToken);
      throw new NotFoundError('Scenario', scenarioId);
    }

    return vote;
  }

  /**
   * Remove a voter's vote on one scenario so they can cast it again.
   */
  async retractVote(scenarioId: ScenarioId, voterToken: string): Promise<number> {
    assertVoterToken(voterToken);
    await this.scenarios.get(scenarioId);

    const removed = await this.votes.deleteByScenarioAndVoter(scenarioId, voterToken);
    if (removed === 0) {
      throw new NotFoundError(`Vote on scenario ${scenarioId}`);
    }
    return removed;
  }

  async clearVotes(voterToken: string): Promise<number> {
    assertVoterToken(voterToken);
    return this.votes.deleteByVoter(voterToken);
  }

  async votesBy(voterToken: string): Promise<Vote[]> {
    assertVoterToken(voterToken);
    return this.votes.findByVoter(voterToken);
  }

  async summary(scenarioId: ScenarioId): Promise<Summary> {
    await this.scenarios.get(scenarioId);
    const votes = await this.votes.findByScenario(scenarioId);
    return summarizeVotes(scenarioId, votes);
  }

  async allSummaries(): Promise<SummaryMap> {
    const [scenarios, votes] = await Promise.all([this.scenarios.list(), this.votes.findAll()]);

    const byScenario = new Map<ScenarioId, Vote[]>();
    for (const vote of votes) {
      const bucket = byScenario.get(vote.scenarioId);
      if (bucket) {
        bucket.push(vote);
      } else {
        byScenario.set(vote.scenarioId, [vote]);
      }
    }

    const summaries: SummaryMap = {};
    for (const scenario of scenarios) {
      summaries[scenario.id] = summarizeVotes(scenario.id, byScenario.get(scenario.id) ?? []);
    }
    return summaries;
  }

  /**
   * Distinct voters with at least one vote, and their display names in first-vote order.
   */
  async participation(): Promise<Participation> {
    const votes = await this.votes.findAll();
    const tokens = new Set<string>();
    const names = new Set<string>();

    for (const vote of votes) {
      tokens.add(vote.voterToken);
      if (vote.voterName) {
        names.add(vote.voterName);
      }
    }

    return { voterCount: tokens.size, voters: [...names] };
  }

  async clear(): Promise<void> {
    await this.votes.clear();
  }
}

function assertVoterToken(voterToken: string): void {
  if (voterToken.trim().length === 0) {
    throw new ValidationError('Voter token must not be empty', { field: 'voterToken' });
  }
  if (voterToken.length > MAX_VOTER_TOKEN_LENGTH) {
    throw new ValidationError(
      `Voter token must be at most ${MAX_VOTER_TOKEN_LENGTH} characters`,
      { field: 'voterToken', maxLength: MAX_VOTER_TOKEN_LENGTH }
    );
  }
}
