import knex, { type Knex } from 'knex';
import { loadConfig, type HelpdeskConfig } from '@deskflow/core/config';
import logger from '@deskflow/core/logger';
import { getKnexConfig } from './knexfile';

/**
 * Opens a connection pool. The caller owns the returned instance and must destroy it.
 */
export function createDbConnection(config: HelpdeskConfig = loadConfig()): Knex {
  const knexConfig = getKnexConfig(config);
  logger.info('[Database] opening connection pool', {
    host: knexConfig.connection.host,
    database: knexConfig.connection.database,
    poolMax: knexConfig.pool.max,
  });
  return knex(knexConfig);
}

export async function destroyDbConnection(db: Knex): Promise<void> {
  await db.destroy();
  logger.info('[Database] connection pool closed');
}

/**
 * Normalizes `count(*)` results, which drivers return as number, string or bigint.
 */
export function toCount(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint' || typeof value === 'string') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}
