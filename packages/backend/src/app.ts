import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { AppConfig } from './lib/config/app.js';
import { registerErrorHandler } from './lib/error-handler.js';
import { createRedisClient } from './lib/redis.js';
import { createServices, type Services } from './services/index.js';
import { createMemoryStorage } from './storage/memory.storage.js';
import { createRedisStorage } from './storage/redis.storage.js';
import type { Storage } from './storage/types.js';
import { scenariosRoutes } from './routes/scenarios.js';
import { votesRoutes } from './routes/votes.js';
import { resultsRoutes } from './routes/results.js';
import { adminRoutes } from './routes/admin.js';
import { settingsRoutes } from './routes/settings.js';

export type AppSettings = Pick<
  AppConfig,
  'frontendUrl' | 'maxScenarioLength' | 'preventDuplicateVotes' | 'adminPassword' | 'storageDriver' | 'redis'
>;

export interface BuildAppOptions {
  config: AppSettings;
  /** false silences logging (tests) */
  logger?: boolean | { level: string };
  /** Overrides the storage selected by config.storageDriver */
  storage?: Storage;
}

export interface BuiltApp {
  app: FastifyInstance;
  services: Services;
  storage: Storage;
}

export async function buildApp({ config, logger = true, storage }: BuildAppOptions): Promise<BuiltApp> {
  const fastify = Fastify({ logger });

  const selectedStorage =
    storage ??
    (config.storageDriver === 'redis'
      ? createRedisStorage(createRedisClient(config.redis, fastify.log))
      : createMemoryStorage());

  const services = createServices(selectedStorage, config);

  await fastify.register(cors, {
    origin: config.frontendUrl,
  });

  registerErrorHandler(fastify);

  fastify.addHook('onClose', async () => {
    await selectedStorage.close();
  });

  fastify.get('/health', async () => {
    return {
      status: 'ok',
      storage: {
        driver: selectedStorage.driver,
        available: await selectedStorage.isAvailable(),
      },
      duplicateVotePrevention: services.votes.preventDuplicateVotes,
      resetEnabled: services.admin.resetEnabled,
    };
  });

  await fastify.register(scenariosRoutes, { services });
  await fastify.register(votesRoutes, { services });
  await fastify.register(resultsRoutes, { services });
  await fastify.register(adminRoutes, { services });
  await fastify.register(settingsRoutes, { services });

  return { app: fastify, services, storage: selectedStorage };
}
