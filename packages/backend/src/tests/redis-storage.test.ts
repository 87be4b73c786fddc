import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  CREATE_SCENARIO_SCRIPT,
  INSERT_VOTE_SCRIPT,
  REDIS_KEYS,
  RedisScenarioRepository,
  RedisVoteRepository,
  createRedisStorage,
} from '../storage/redis.storage.js';
import type { Vote } from '../types/index.js';

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

const mockRedis = {
  eval: vi.fn(),
  hget: vi.fn(),
  hmget: vi.fn(),
  lrange: vi.fn(),
  lrem: vi.fn(),
  srem: vi.fn(),
  del: vi.fn(),
  ping: vi.fn(),
  quit: vi.fn(),
};

function voteJson(overrides: Partial<Vote> = {}): string {
  const vote: Vote = {
    scenarioId: 1,
    score: 3,
    voterToken: 'tok1',
    voterName: null,
    castAt: '2024-09-02T09:00:00.000Z',
    ...overrides,
  };
  return JSON.stringify(vote);
}

describe('RedisScenarioRepository', () => {
  let repository: RedisScenarioRepository;

  beforeEach(() => {
    vi.clearAllMocks();
    repository = new RedisScenarioRepository(mockRedis);
  });

  it('creates the scenario in one script call and returns the assigned id', async () => {
    mockRedis.eval.mockResolvedValue(7);
    const input = { text: 'Proctoring by webcam', submittedBy: null, submittedAt: '2024-09-02T09:00:00.000Z' };

    const scenario = await repository.create(input);

    expect(scenario).toEqual({ id: 7, ...input });
    expect(mockRedis.eval).toHaveBeenCalledTimes(1);
    expect(mockRedis.eval).toHaveBeenCalledWith(
      CREATE_SCENARIO_SCRIPT,
      3,
      'scenario:seq',
      'scenarios',
      'scenario:ids',
      JSON.stringify(input)
    );
  });

  it('surfaces a failed create and succeeds on retry', async () => {
    const input = { text: 'Essay feedback', submittedBy: 'Ana', submittedAt: '2024-09-02T09:00:00.000Z' };
    mockRedis.eval.mockRejectedValueOnce(new Error('OOM command not allowed')).mockResolvedValueOnce(1);

    await expect(repository.create(input)).rejects.toThrow('OOM command not allowed');
    expect(await repository.create(input)).toEqual({ id: 1, ...input });
  });

  it('rejects a reply that is not an id', async () => {
    mockRedis.eval.mockResolvedValue('seven');
    await expect(
      repository.create({ text: 'A', submittedBy: null, submittedAt: '2024-09-02T09:00:00.000Z' })
    ).rejects.toThrow();
  });

  it('loads scenarios in id-list order and skips missing hash entries', async () => {
    const a = { id: 1, text: 'A', submittedBy: null, submittedAt: '2024-09-02T09:00:00.000Z' };
    const c = { id: 3, text: 'C', submittedBy: 'Team C', submittedAt: '2024-09-02T09:02:00.000Z' };
    mockRedis.lrange.mockResolvedValue(['1', '2', '3']);
    mockRedis.hmget.mockResolvedValue([JSON.stringify(a), null, JSON.stringify(c)]);

    expect(await repository.findAll()).toEqual([a, c]);
    expect(mockRedis.hmget).toHaveBeenCalledWith('scenarios', '1', '2', '3');
  });

  it('skips HMGET when there are no scenarios', async () => {
    mockRedis.lrange.mockResolvedValue([]);

    expect(await repository.findAll()).toEqual([]);
    expect(mockRedis.hmget).not.toHaveBeenCalled();
  });

  it('returns null for an unknown id', async () => {
    mockRedis.hget.mockResolvedValue(null);
    expect(await repository.findById(4)).toBeNull();
  });

  it('rejects a corrupted record', async () => {
    mockRedis.hget.mockResolvedValue(JSON.stringify({ id: 'one', text: 5 }));
    await expect(repository.findById(1)).rejects.toThrow();
  });
});

describe('RedisVoteRepository', () => {
  let repository: RedisVoteRepository;

  beforeEach(() => {
    vi.clearAllMocks();
    repository = new RedisVoteRepository(mockRedis);
  });

  it('checks and stores a vote in one script call', async () => {
    mockRedis.eval.mockResolvedValue(1);
    const raw = voteJson();

    expect(await repository.insert(JSON.parse(raw), { unique: true })).toBe(true);
    expect(mockRedis.eval).toHaveBeenCalledTimes(1);
    expect(mockRedis.eval).toHaveBeenCalledWith(
      INSERT_VOTE_SCRIPT,
      2,
      REDIS_KEYS.voters(1),
      'votes:1',
      'tok1',
      raw,
      '1'
    );
  });

  it('refuses a repeat voter when unique is set', async () => {
    mockRedis.eval.mockResolvedValue(0);

    expect(await repository.insert(JSON.parse(voteJson()), { unique: true })).toBe(false);
  });

  it('passes the unique flag through when repeat votes are allowed', async () => {
    mockRedis.eval.mockResolvedValue(1);

    expect(await repository.insert(JSON.parse(voteJson()), { unique: false })).toBe(true);
    expect(mockRedis.eval.mock.calls[0][6]).toBe('0');
  });

  it('lets the voter retry after a failed write', async () => {
    mockRedis.eval.mockRejectedValueOnce(new Error('READONLY replica')).mockResolvedValueOnce(1);
    const vote: Vote = JSON.parse(voteJson());

    await expect(repository.insert(vote, { unique: true })).rejects.toThrow('READONLY replica');
    expect(await repository.insert(vote, { unique: true })).toBe(true);
    expect(mockRedis.srem).not.toHaveBeenCalled();
  });

  it('removes only the matching voter entries', async () => {
    const mine = voteJson({ voterToken: 'tok1', score: 2 });
    const theirs = voteJson({ voterToken: 'tok2', score: 5 });
    mockRedis.lrange.mockResolvedValue([mine, theirs]);
    mockRedis.lrem.mockResolvedValue(1);

    expect(await repository.deleteByScenarioAndVoter(1, 'tok1')).toBe(1);
    expect(mockRedis.lrem).toHaveBeenCalledWith('votes:1', 0, mine);
    expect(mockRedis.lrem).toHaveBeenCalledTimes(1);
    expect(mockRedis.srem).toHaveBeenCalledWith('voters:1', 'tok1');
  });

  it('collects votes across scenarios for a voter', async () => {
    mockRedis.lrange.mockImplementation(async (key: string) => {
      if (key === 'scenario:ids') return ['1', '2'];
      if (key === 'votes:1') return [voteJson({ scenarioId: 1, voterToken: 'tok2' })];
      return [voteJson({ scenarioId: 2, voterToken: 'tok1', score: 4 })];
    });

    const votes = await repository.findByVoter('tok1');

    expect(votes).toHaveLength(1);
    expect(votes[0]).toMatchObject({ scenarioId: 2, score: 4 });
  });

  it('deletes vote and voter keys for every scenario on clear', async () => {
    mockRedis.lrange.mockResolvedValue(['1', '2']);

    await repository.clear();

    expect(mockRedis.del).toHaveBeenCalledWith('votes:1', 'voters:1', 'votes:2', 'voters:2');
  });
});

describe('createRedisStorage', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('reports availability from PING', async () => {
    const storage = createRedisStorage(mockRedis);

    mockRedis.ping.mockResolvedValue('PONG');
    expect(await storage.isAvailable()).toBe(true);

    mockRedis.ping.mockRejectedValue(new Error('ECONNREFUSED'));
    expect(await storage.isAvailable()).toBe(false);
  });

  it('quits the client on close', async () => {
    mockRedis.quit.mockResolvedValue('OK');
    await createRedisStorage(mockRedis).close();
    expect(mockRedis.quit).toHaveBeenCalledTimes(1);
  });
});
