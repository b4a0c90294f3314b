import { config } from './config/index.js';
import { RoutingConfigStore } from './config/routing-config.js';
import logger from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { createRandom } from './utils/random.js';
import { db, healthCheck as postgresHealth, closePool } from './db/postgres.js';
import { getRedis, healthCheck as redisHealth, closeRedis } from './db/redis.js';
import { createCore, memoryStorage, postgresStorage } from './core.js';
import { createApp, type HealthProbe } from './app.js';
import { configureJobs, startJobs, stopJobs } from './jobs/job-runner.js';

async function main(): Promise<void> {
  // A malformed routing file is fatal here
  const configStore = await RoutingConfigStore.fromFile(config.routing.configPath);

  const usePostgres = config.storage.driver === 'postgres';
  const storage = usePostgres
    ? postgresStorage(db, getRedis(), config.redis.keyPrefix)
    : memoryStorage();

  const core = await createCore({
    configStore,
    storage,
    random: createRandom(`${config.routing.seed}:${process.pid}:${Date.now()}`),
  });

  const healthProbes: Record<string, HealthProbe> = usePostgres
    ? { postgres: postgresHealth, redis: redisHealth }
    : {};

  const app = createApp(core, { corsOrigin: config.cors.origin, healthProbes });

  configureJobs(core, {
    learningEnabled: config.learning.enabled,
    learningIntervalMs: config.learning.intervalMs,
  });

  // Graceful shutdown
  async function shutdown(): Promise<void> {
    logger.info('Shutting down...');
    stopJobs();
    if (usePostgres) {
      await closePool();
      await closeRedis();
    }
    process.exit(0);
  }

  const onSignal = () => {
    void shutdown().catch(error => {
      logger.error('Shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  // Start server
  app.listen(config.port, () => {
    logger.info(`Generation router running on port ${config.port}`, {
      env: config.nodeEnv,
      storage: storage.driver,
      configVersion: configStore.current().version,
      policyVersion: core.policy.current().version,
    });

    // Start background jobs
    startJobs();
  });
}

void main().catch(error => {
  logger.error('Startup failed', { error: errorMessage(error) });
  process.exit(1);
});
