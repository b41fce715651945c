import knex, { Knex } from 'knex';
import logger from './logger';
import { config } from './env';

/**
 * Creates the PostgreSQL query builder
 * Connections are opened lazily by the pool
 */
export function createDatabase(connectionString: string = config.databaseUrl): Knex {
  const db = knex({
    client: 'pg',
    connection: connectionString,
    pool: { min: 0, max: 10 },
  });

  logger.info('Database pool configured');

  return db;
}
