import type { Scenario, ScenarioId, Vote } from '../types/index.js';
import type {
  InsertVoteOptions,
  NewScenario,
  ScenarioRepository,
  Storage,
  VoteRepository,
} from './types.js';

// Each method does its work before the first await, so a check-then-write
// cannot interleave with another request on the single event loop.

export class MemoryScenarioRepository implements ScenarioRepository {
  private scenarios: Scenario[] = [];
  private nextId = 1;

  async create(input: NewScenario): Promise<Scenario> {
    const scenario: Scenario = { id: this.nextId++, ...input };
    this.scenarios.push(scenario);
    return { ...scenario };
  }

  async findAll(): Promise<Scenario[]> {
    return this.scenarios.map((scenario) => ({ ...scenario }));
  }

  async findById(id: ScenarioId): Promise<Scenario | null> {
    const scenario = this.scenarios.find((s) => s.id === id);
    return scenario ? { ...scenario } : null;
  }

  async clear(): Promise<void> {
    this.scenarios = [];
    this.nextId = 1;
  }
}

export class MemoryVoteRepository implements VoteRepository {
  private votes: Vote[] = [];

  async insert(vote: Vote, options: InsertVoteOptions): Promise<boolean> {
    if (
      options.unique &&
      this.votes.some((v) => v.scenarioId === vote.scenarioId && v.voterToken === vote.voterToken)
    ) {
      return false;
    }
    this.votes.push({ ...vote });
    return true;
  }

  async findByScenario(scenarioId: ScenarioId): Promise<Vote[]> {
    return this.votes.filter((v) => v.scenarioId === scenarioId).map((v) => ({ ...v }));
  }

  async findAll(): Promise<Vote[]> {
    return this.votes.map((v) => ({ ...v }));
  }

  async findByVoter(voterToken: string): Promise<Vote[]> {
    return this.votes.filter((v) => v.voterToken === voterToken).map((v) => ({ ...v }));
  }

  async deleteByScenarioAndVoter(scenarioId: ScenarioId, voterToken: string): Promise<number> {
    const before = this.votes.length;
    this.votes = this.votes.filter(
      (v) => !(v.scenarioId === scenarioId && v.voterToken === voterToken)
    );
    return before - this.votes.length;
  }

  async deleteByVoter(voterToken: string): Promise<number> {
    const before = this.votes.length;
    this.votes = this.votes.filter((v) => v.voterToken !== voterToken);
    return before - this.votes.length;
  }

  async clear(): Promise<void> {
    this.votes = [];
  }
}

export function createMemoryStorage(): Storage {
  return {
    driver: 'memory',
    scenarios: new MemoryScenarioRepository(),
    votes: new MemoryVoteRepository(),
    isAvailable: async () => true,
    async close() {},
  };
}
