import { pino } from 'pino';
import type { Logger } from 'pino';

import { ConfigError, loadRegistryConfig } from './infrastructure/config/index.js';
import type { RegistryConfig } from './infrastructure/config/index.js';
import { openStoreHandles } from './infrastructure/store/index.js';
import { ensureAdminCredential } from './application/keys.js';
import { buildApp, createRegistryServices } from './app.js';

/**
 * Bootstrap the registry server.
 *
 * Order:
 * 1) config + logger
 * 2) store handles, admin credential
 * 3) services + Fastify app
 * 4) listen(), then start the health scheduler
 * 5) shutdown on SIGINT/SIGTERM
 */
function loadConfigOrExit(bootLog: Logger): RegistryConfig {
  try {
    return loadRegistryConfig();
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      bootLog.fatal({ issues: err.issues }, 'Invalid configuration');
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const config = loadConfigOrExit(pino({ level: process.env['LOG_LEVEL'] ?? 'info' }));
  const log = pino({ level: config.server.logLevel });

  const stores = await openStoreHandles(config.store, log);
  await ensureAdminCredential(stores.requests, config.adminApiKey, log);

  const services = createRegistryServices(config, stores, log);
  const fastify = await buildApp(services, log);

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');

    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });

  services.scheduler.start();
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
