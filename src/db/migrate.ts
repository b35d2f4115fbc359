import { fileURLToPath } from 'node:url';
import { loadAppConfig } from '../config.js';
import { createLogger } from '../logging/index.js';
import { closePool, getPool } from '../utils/db.js';
import { runMigrations } from '../utils/migrationRunner.js';

// Run directly if executed as a script
const isMain = process.argv[1] && fileURLToPath(import.meta.url).includes(process.argv[1]);
if (isMain) {
  const config = loadAppConfig();
  const logger = createLogger({ service: config.serviceName, level: config.logLevel }).child({
    operation: 'migrate',
  });

  runMigrations(getPool(), { logger })
    .then((applied) => {
      logger.info('All migrations applied.', { count: applied.length });
      return closePool();
    })
    .catch((err: unknown) => {
      logger.fatal('Migration failed', err instanceof Error ? err : new Error(String(err)));
      process.exit(1);
    });
}
