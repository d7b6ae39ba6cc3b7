import pg from 'pg';
import { buildServer } from './api/server.js';
import { loadConfig } from './config.js';
import { applySchema } from './db/schema.js';
import { ConfigError } from './domain/errors.js';
import { createCustomerSource } from './features/customers/source.js';
import type { AppConfig } from './config.js';

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  if (!(err instanceof ConfigError)) throw err;
  console.error(`Error: ${err.message}`);
  process.exit(1);
}

const pool = new pg.Pool({ connectionString: config.databaseUrl });

const client = await pool.connect();
try {
  await applySchema(client);
} finally {
  client.release();
}

const app = buildServer({
  customers: createCustomerSource(pool),
  filterValuePolicy: config.filterValuePolicy,
  logger: { level: config.logLevel },
});

try {
  await app.listen({ port: config.port, host: '0.0.0.0' });
} catch (err) {
  app.log.error(err);
  await pool.end();
  process.exit(1);
}

process.on('SIGTERM', () => {
  app.close()
    .then(() => pool.end())
    .catch((err: unknown) => {
      app.log.error(err);
      process.exitCode = 1;
    });
});
