import { Redis } from 'ioredis';
import type { FastifyBaseLogger } from 'fastify';
import type { RedisConfig } from './config/app.js';

/**
 * Create a Redis client with a bounded retry strategy.
 * All keys are namespaced by `config.keyPrefix`.
 */
export function createRedisClient(config: RedisConfig, log: FastifyBaseLogger): Redis {
  const client = new Redis({
    host: config.host,
    port: config.port,
    password: config.password || undefined,
    db: config.db,
    keyPrefix: config.keyPrefix,
    retryStrategy: (times: number) => {
      if (times > 3) {
        // Stop retrying after 3 attempts
        return null;
      }
      // Exponential backoff: 100ms, 200ms, 400ms
      return Math.min(times * 100, 400);
    },
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  });

  client.on('error', (err: Error) => {
    log.error({ err }, 'Redis connection error');
  });

  client.on('connect', () => {
    log.info({ host: config.host, port: config.port }, 'Redis connected');
  });

  return client;
}

/**
 * Check if Redis is available
 */
export async function isRedisAvailable(client: Pick<Redis, 'ping'>): Promise<boolean> {
  try {
    await client.ping();
    return true;
  } catch {
    return false;
  }
}
