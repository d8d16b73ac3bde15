/**
 * Knex configuration derived from the validated environment.
 */
import type { Knex } from 'knex';
import type { HelpdeskConfig } from '@deskflow/core/config';

interface PgSessionConnection {
  query: (sql: string, callback: (err: Error | null) => void) => void;
}

type AfterCreateDone = (err: Error | null, connection: PgSessionConnection) => void;

export interface HelpdeskKnexConfig extends Knex.Config {
  client: 'pg';
  connection: Knex.PgConnectionConfig;
  pool: {
    min: number;
    max: number;
    idleTimeoutMillis: number;
    createTimeoutMillis: number;
    afterCreate: (conn: PgSessionConnection, done: AfterCreateDone) => void;
  };
}

export function getKnexConfig(config: HelpdeskConfig): HelpdeskKnexConfig {
  const { database } = config;
  return {
    client: 'pg',
    connection: {
      host: database.host,
      port: database.port,
      user: database.user,
      password: database.password,
      database: database.database,
    },
    pool: {
      min: database.pool.min,
      max: database.pool.max,
      idleTimeoutMillis: 1000,
      createTimeoutMillis: 3000,
      // Every timestamp the application writes is UTC.
      afterCreate: (conn, done) => {
        conn.query("SET TIME ZONE 'UTC'", (err) => {
          done(err, conn);
        });
      },
    },
    acquireConnectionTimeout: 60000,
  };
}
