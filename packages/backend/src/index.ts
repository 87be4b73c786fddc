import 'dotenv/config';
import { buildApp } from './app.js';
import { getAppConfig } from './lib/config/app.js';

const config = getAppConfig();

const { app } = await buildApp({
  config,
  logger: { level: config.logLevel },
});

app.log.info(
  {
    storage: config.storageDriver,
    maxScenarioLength: config.maxScenarioLength,
    preventDuplicateVotes: config.preventDuplicateVotes,
  },
  'Class vote configuration loaded'
);

if (config.adminPassword === null) {
  app.log.warn('Admin reset: disabled (ADMIN_PASSWORD not set)');
}

const shutdown = async (signal: string) => {
  app.log.info({ signal }, 'Shutting down');
  await app.close();
  process.exit(0);
};

process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));

const start = async () => {
  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

await start();
