import type { AppConfig } from '../lib/config/app.js';
import type { Storage } from '../storage/types.js';
import { AdminService } from './admin.service.js';
import { ScenarioStore } from './scenario-store.service.js';
import { VoteAggregator } from './vote-aggregator.service.js';

export interface Services {
  scenarios: ScenarioStore;
  votes: VoteAggregator;
  admin: AdminService;
}

/** Route plugins receive the services through their register options */
export interface ServiceRouteOptions {
  services: Services;
}

export type ServiceSettings = Pick<
  AppConfig,
  'maxScenarioLength' | 'preventDuplicateVotes' | 'adminPassword'
>;

export function createServices(storage: Storage, settings: ServiceSettings): Services {
  const scenarios = new ScenarioStore(storage.scenarios, {
    maxTextLength: settings.maxScenarioLength,
  });
  const votes = new VoteAggregator(storage.votes, scenarios, {
    preventDuplicateVotes: settings.preventDuplicateVotes,
  });
  const admin = new AdminService(scenarios, votes, settings.adminPassword);

  return { scenarios, votes, admin };
}

export { AdminService, ScenarioStore, VoteAggregator };
