import type { Scenario, ScenarioId, Vote } from '../types/index.js';

export interface NewScenario {
  text: string;
  submittedBy: string | null;
  submittedAt: string;
}

export interface ScenarioRepository {
  /** Assigns the next sequential id */
  create(input: NewScenario): Promise<Scenario>;
  /** Submission order, oldest first */
  findAll(): Promise<Scenario[]>;
  findById(id: ScenarioId): Promise<Scenario | null>;
  clear(): Promise<void>;
}

export interface InsertVoteOptions {
  /**
   * Reject the vote when the voter already has one on the scenario.
   * The existence check and the insert must not interleave with another insert.
   */
  unique: boolean;
}

export interface VoteRepository {
  /** Returns false when `unique` is set and the pair already has a vote */
  insert(vote: Vote, options: InsertVoteOptions): Promise<boolean>;
  findByScenario(scenarioId: ScenarioId): Promise<Vote[]>;
  findAll(): Promise<Vote[]>;
  findByVoter(voterToken: string): Promise<Vote[]>;
  /** Returns the number of votes removed */
  deleteByScenarioAndVoter(scenarioId: ScenarioId, voterToken: string): Promise<number>;
  deleteByVoter(voterToken: string): Promise<number>;
  clear(): Promise<void>;
}

export interface Storage {
  driver: 'memory' | 'redis';
  scenarios: ScenarioRepository;
  votes: VoteRepository;
  isAvailable(): Promise<boolean>;
  close(): Promise<void>;
}
