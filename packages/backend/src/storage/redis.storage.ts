import type { Redis } from 'ioredis';
import { z } from 'zod';
import type { Scenario, ScenarioId, Vote } from '../types/index.js';
import { isRedisAvailable } from '../lib/redis.js';
import type {
  InsertVoteOptions,
  NewScenario,
  ScenarioRepository,
  Storage,
  VoteRepository,
} from './types.js';

// Key layout (the client adds the configured prefix):
//   scenario:seq     INCR counter for scenario ids
//   scenarios        hash  id -> scenario JSON
//   scenario:ids     list  ids in submission order
//   votes:<id>       list  vote JSON in cast order
//   voters:<id>      set   voter tokens with a vote on <id>
export const REDIS_KEYS = {
  scenarioSeq: 'scenario:seq',
  scenarios: 'scenarios',
  scenarioIds: 'scenario:ids',
  votes: (scenarioId: ScenarioId) => `votes:${scenarioId}`,
  voters: (scenarioId: ScenarioId) => `voters:${scenarioId}`,
};

export type RedisCommands = Pick<
  Redis,
  'eval' | 'hget' | 'hmget' | 'lrange' | 'lrem' | 'srem' | 'del' | 'ping' | 'quit'
>;

// Writes that touch more than one key run as Lua scripts so Redis applies
// them as a single step: a failed call leaves nothing behind.

// KEYS: seq, scenarios hash, id list. ARGV: scenario JSON without id.
export const CREATE_SCENARIO_SCRIPT = `
local id = redis.call('INCR', KEYS[1])
local scenario = cjson.decode(ARGV[1])
scenario.id = id
redis.call('HSET', KEYS[2], tostring(id), cjson.encode(scenario))
redis.call('RPUSH', KEYS[3], tostring(id))
return id
`;

// KEYS: voter set, vote list. ARGV: voter token, vote JSON, '1' when unique.
export const INSERT_VOTE_SCRIPT = `
local added = redis.call('SADD', KEYS[1], ARGV[1])
if ARGV[3] == '1' and added == 0 then
  return 0
end
redis.call('RPUSH', KEYS[2], ARGV[2])
return 1
`;

const scriptIdSchema = z.number().int().positive();
const scriptFlagSchema = z.union([z.literal(0), z.literal(1)]);

const storedScenarioSchema = z.object({
  id: z.number().int().positive(),
  text: z.string(),
  submittedBy: z.string().nullable(),
  submittedAt: z.string(),
});

const storedVoteSchema = z.object({
  scenarioId: z.number().int().positive(),
  score: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5)]),
  voterToken: z.string(),
  voterName: z.string().nullable(),
  castAt: z.string(),
});

function parseScenario(raw: string): Scenario {
  return storedScenarioSchema.parse(JSON.parse(raw));
}

function parseVote(raw: string): Vote {
  return storedVoteSchema.parse(JSON.parse(raw));
}

async function loadScenarioIds(redis: RedisCommands): Promise<ScenarioId[]> {
  const ids = await redis.lrange(REDIS_KEYS.scenarioIds, 0, -1);
  return ids.map(Number);
}

export class RedisScenarioRepository implements ScenarioRepository {
  constructor(private readonly redis: RedisCommands) {}

  async create(input: NewScenario): Promise<Scenario> {
    const result = await this.redis.eval(
      CREATE_SCENARIO_SCRIPT,
      3,
      REDIS_KEYS.scenarioSeq,
      REDIS_KEYS.scenarios,
      REDIS_KEYS.scenarioIds,
      JSON.stringify(input)
    );
    return { id: scriptIdSchema.parse(result), ...input };
  }

  async findAll(): Promise<Scenario[]> {
    const ids = await loadScenarioIds(this.redis);
    if (ids.length === 0) {
      return [];
    }
    const rows = await this.redis.hmget(REDIS_KEYS.scenarios, ...ids.map(String));
    return rows.flatMap((raw) => (raw === null ? [] : [parseScenario(raw)]));
  }

  async findById(id: ScenarioId): Promise<Scenario | null> {
    const raw = await this.redis.hget(REDIS_KEYS.scenarios, String(id));
    return raw === null ? null : parseScenario(raw);
  }

  async clear(): Promise<void> {
    await this.redis.del(REDIS_KEYS.scenarioSeq, REDIS_KEYS.scenarios, REDIS_KEYS.scenarioIds);
  }
}

export class RedisVoteRepository implements VoteRepository {
  constructor(private readonly redis: RedisCommands) {}

  async insert(vote: Vote, options: InsertVoteOptions): Promise<boolean> {
    const result = await this.redis.eval(
      INSERT_VOTE_SCRIPT,
      2,
      REDIS_KEYS.voters(vote.scenarioId),
      REDIS_KEYS.votes(vote.scenarioId),
      vote.voterToken,
      JSON.stringify(vote),
      options.unique ? '1' : '0'
    );
    return scriptFlagSchema.parse(result) === 1;
  }

  async findByScenario(scenarioId: ScenarioId): Promise<Vote[]> {
    const rows = await this.redis.lrange(REDIS_KEYS.votes(scenarioId), 0, -1);
    return rows.map(parseVote);
  }

  async findAll(): Promise<Vote[]> {
    const ids = await loadScenarioIds(this.redis);
    const perScenario = await Promise.all(ids.map((id) => this.findByScenario(id)));
    return perScenario.flat();
  }

  async findByVoter(voterToken: string): Promise<Vote[]> {
    const all = await this.findAll();
    return all.filter((vote) => vote.voterToken === voterToken);
  }

  async deleteByScenarioAndVoter(scenarioId: ScenarioId, voterToken: string): Promise<number> {
    const rows = await this.redis.lrange(REDIS_KEYS.votes(scenarioId), 0, -1);
    const matching = new Set(rows.filter((raw) => parseVote(raw).voterToken === voterToken));

    let removed = 0;
    for (const raw of matching) {
      removed += await this.redis.lrem(REDIS_KEYS.votes(scenarioId), 0, raw);
    }
    await this.redis.srem(REDIS_KEYS.voters(scenarioId), voterToken);
    return removed;
  }

  async deleteByVoter(voterToken: string): Promise<number> {
    const ids = await loadScenarioIds(this.redis);
    let removed = 0;
    for (const id of ids) {
      removed += await this.deleteByScenarioAndVoter(id, voterToken);
    }
    return removed;
  }

  async clear(): Promise<void> {
    const ids = await loadScenarioIds(this.redis);
    if (ids.length === 0) {
      return;
    }
    await this.redis.del(...ids.flatMap((id) => [REDIS_KEYS.votes(id), REDIS_KEYS.voters(id)]));
  }
}

export function createRedisStorage(redis: RedisCommands): Storage {
  return {
    driver: 'redis',
    scenarios: new RedisScenarioRepository(redis),
    votes: new RedisVoteRepository(redis),
    isAvailable: () => isRedisAvailable(redis),
    async close() {
      await redis.quit();
    },
  };
}
