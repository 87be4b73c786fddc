import { createHash, timingSafeEqual } from 'crypto';
import { ForbiddenError, UnauthorizedError } from '../lib/errors.js';
import type { ScenarioStore } from './scenario-store.service.js';
import type { VoteAggregator } from './vote-aggregator.service.js';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

export function passwordMatches(candidate: string, expected: string): boolean {
  // Hash both sides so timingSafeEqual always compares equal-length buffers
  return timingSafeEqual(digest(candidate), digest(expected));
}

export class AdminService {
  constructor(
    private readonly scenarios: ScenarioStore,
    private readonly votes: VoteAggregator,
    private readonly adminPassword: string | null
  ) {}

  get resetEnabled(): boolean {
    return this.adminPassword !== null;
  }

  /**
   * Wipe every scenario and vote. Votes go first: the redis adapter
   * finds vote keys through the scenario id list.
   */
  async resetAll(password: string): Promise<void> {
    if (this.adminPassword === null) {
      throw new ForbiddenError('Data reset is disabled: ADMIN_PASSWORD is not configured');
    }
    if (!passwordMatches(password, this.adminPassword)) {
      throw new UnauthorizedError('Incorrect admin password');
    }

    await this.votes.clear();
    await this.scenarios.clear();
  }
}
