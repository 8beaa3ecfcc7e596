import type { Logger } from 'pino';
import type { StoreConfig } from '../config/index.js';
import { createDbClient, ensureRegistrySchema } from './client.js';
import { createMemoryHandles } from './memory-store.js';
import { PostgresStore } from './postgres-store.js';
import type { StoreHandles } from './types.js';

/**
 * Opens the three persistence handles the process runs on.
 *
 * Postgres: three single-connection pools, so a slow scheduler batch or a
 * burst of webhook bookkeeping never queues behind interactive requests.
 */
export async function openStoreHandles(config: StoreConfig, log: Logger): Promise<StoreHandles> {
  if (config.driver === 'memory') {
    log.warn('Using in-memory store; data is lost on restart');
    return createMemoryHandles();
  }

  const requests = createDbClient(config.databaseUrl);
  const scheduler = createDbClient(config.databaseUrl);
  const webhooks = createDbClient(config.databaseUrl);

  await ensureRegistrySchema(requests.sql);
  log.info('Database ready (registry_records table)');

  return {
    requests: new PostgresStore(requests.db, 'requests'),
    scheduler: new PostgresStore(scheduler.db, 'scheduler'),
    webhooks: new PostgresStore(webhooks.db, 'webhooks'),
    close: async () => {
      await Promise.all([requests.sql.end(), scheduler.sql.end(), webhooks.sql.end()]);
      log.info('Database disconnected');
    },
  };
}
