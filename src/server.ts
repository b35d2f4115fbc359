/**
 * Service entry point: applies migrations, seeds the default catalog,
 * then serves the HTTP API until SIGINT or SIGTERM.
 *
 * @module server
 */

import type { Server } from 'node:http';
import { fileURLToPath } from 'node:url';
import { createApp } from './app.js';
import { loadAppConfig, type AppConfig } from './config.js';
import { createLogger, type Logger } from './logging/index.js';
import { initializeDefaultData } from './services/catalogBootstrapper.js';
import { bcryptHasher } from './services/passwordService.js';
import { RbacService } from './services/rbacService.js';
import { createTokenService } from './services/tokenService.js';
import { PgIdentityStore } from './store/pgIdentityStore.js';
import { closePool, getPool } from './utils/db.js';
import { runMigrations } from './utils/migrationRunner.js';

export async function startServer(config: AppConfig, logger: Logger): Promise<Server> {
  if (!config.jwtSecret) {
    throw new Error('JWT_SECRET environment variable is not set');
  }

  const pool = getPool();
  await runMigrations(pool, { logger: logger.child({ operation: 'migrate' }) });

  const store = PgIdentityStore.fromPool(pool);
  const initializeCatalog = () => initializeDefaultData(store, logger);
  if (config.seedOnStartup) {
    await initializeCatalog();
  }

  const app = createApp({
    rbac: new RbacService({ store, passwordService: bcryptHasher, logger }),
    passwordService: bcryptHasher,
    tokenService: createTokenService({
      secret: config.jwtSecret,
      expiresInMinutes: config.accessTokenExpireMinutes,
    }),
    logger,
    initializeCatalog,
  });

  return new Promise((resolve) => {
    const server = app.listen(config.httpPort, config.httpHost, () => {
      logger.info('Server listening', { host: config.httpHost, port: config.httpPort });
      resolve(server);
    });
  });
}

function shutdownOnSignal(server: Server, logger: Logger): void {
  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close((closeErr) => {
      closePool()
        .then(() => process.exit(closeErr ? 1 : 0))
        .catch((err: unknown) => {
          logger.error('Failed to close pool', err instanceof Error ? err : new Error(String(err)));
          process.exit(1);
        });
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

// Run directly if executed as a script
const isMain = process.argv[1] && fileURLToPath(import.meta.url).includes(process.argv[1]);
if (isMain) {
  const config = loadAppConfig();
  const logger = createLogger({ service: config.serviceName, level: config.logLevel });

  startServer(config, logger)
    .then((server) => shutdownOnSignal(server, logger))
    .catch((err: unknown) => {
      logger.fatal('Startup failed', err instanceof Error ? err : new Error(String(err)));
      process.exit(1);
    });
}
