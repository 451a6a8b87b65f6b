// apps/api/src/index.ts

import { createApp } from './app';
import { buildContainer } from './container';
import { createDatabase } from './db/client';
import { loadConfig, loadEnvFile } from './lib/config';
import { createRedisClient } from './lib/redis';
import { startSessionReaper, sweepTimedOutSessions } from './modules/sessions/session.reaper';

loadEnvFile();
const config = loadConfig();

const { db, pool } = createDatabase(config.databaseUrl);
const redis = config.redisUrl ? createRedisClient(config.redisUrl) : undefined;
redis?.connect().catch((err: unknown) => {
  console.warn('[redis] initial connect failed, exam durations are read live:', err instanceof Error ? err.message : err);
});
const container = buildContainer(config, db, redis);

const app = createApp(container);

const server = app.listen(config.port, () => {
  console.log(`API listening on port ${config.port} (services: ${config.services.join(', ')})`);
});

const { sweep } = container;
const stopReaper =
  sweep && config.sessionSweepIntervalMs > 0
    ? startSessionReaper(config.sessionSweepIntervalMs, () => sweepTimedOutSessions(sweep))
    : undefined;

function shutdown(signal: string): void {
  console.log(`[api] ${signal} received, shutting down`);
  stopReaper?.();
  server.close(() => {
    redis?.disconnect();
    pool
      .end()
      .catch((err: unknown) => console.error('[db] failed to close pool', err))
      .finally(() => process.exit(0));
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
