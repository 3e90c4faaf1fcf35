import {
  Pool,
  type PoolConfig,
  type QueryResultRow,
} from 'pg';
import { config } from '../config.js';

function buildPoolConfig(): PoolConfig {
  const ssl = config.dbSsl ? { rejectUnauthorized: false } : undefined;

  if (config.databaseUrl) {
    return { connectionString: config.databaseUrl, ssl };
  }

  if (config.dbHost && config.dbUser && config.dbName) {
    return {
      host: config.dbHost,
      port: config.dbPort,
      user: config.dbUser,
      password: config.dbPassword || undefined,
      database: config.dbName,
      ssl,
    };
  }

  throw new Error('DATABASE_NOT_CONFIGURED');
}

let pool: Pool | null = null;

// Created on first query so importing this module never needs a database.
function getPool(): Pool {
  if (!pool) {
    pool = new Pool(buildPoolConfig());
  }
  return pool;
}

export const db = {
  async query<T extends QueryResultRow>(
    text: string,
    params: unknown[] = [],
  ): Promise<T[]> {
    const result = await getPool().query<T>(text, params);
    return result.rows;
  },

  async close(): Promise<void> {
    if (!pool) return;
    await pool.end();
    pool = null;
  },
} as const;
