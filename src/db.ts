import pg from 'pg';
import type { Pool as PgPool, PoolConfig } from 'pg';
import { existsSync } from 'node:fs';
import type { SqlStorageConfig } from './config.ts';

const { Pool } = pg;

function defaultHost(): string {
  // Inside the docker-compose network Postgres is reachable via the service name.
  return existsSync('/.dockerenv') ? 'postgres' : 'localhost';
}

/**
 * Creates the connection pool for the relational recipe backend.
 * An explicit connection string wins; otherwise the standard PG* variables apply.
 */
export function createPool(config: Omit<SqlStorageConfig, 'backend'>, env: NodeJS.ProcessEnv = process.env): PgPool {
  const connection: PoolConfig = config.connectionString
    ? { connectionString: config.connectionString }
    : {
        host: env.PGHOST || defaultHost(),
        port: parseInt(env.PGPORT || '5432', 10),
        user: env.PGUSER || 'recipes',
        password: env.PGPASSWORD || 'recipes',
        database: env.PGDATABASE || 'recipes',
      };

  return new Pool({
    ...connection,
    max: config.maxConnections,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    statement_timeout: config.statementTimeoutMs,
  });
}
