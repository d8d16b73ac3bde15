import { describe, expect, it, vi } from 'vitest';
import { parseConfig } from '@deskflow/core/config';
import { getKnexConfig } from './knexfile';
import { toCount } from './connection';

describe('getKnexConfig', () => {
  it('maps the database section onto a pg connection', () => {
    const config = parseConfig({
      DB_HOST: 'db-host',
      DB_PORT: '5439',
      DB_USER_SERVER: 'app_user',
      DB_NAME_SERVER: 'helpdesk_db',
      DB_PASSWORD_SERVER: 'test-secret',
      DB_POOL_MIN: '0',
      DB_POOL_MAX: '4',
    });

    const knexConfig = getKnexConfig(config);

    expect(knexConfig.client).toBe('pg');
    expect(knexConfig.connection).toEqual({
      host: 'db-host',
      port: 5439,
      user: 'app_user',
      password: 'test-secret',
      database: 'helpdesk_db',
    });
    expect(knexConfig.pool.min).toBe(0);
    expect(knexConfig.pool.max).toBe(4);
  });

  it('pins each new session to UTC', () => {
    const knexConfig = getKnexConfig(parseConfig({}));
    const query = vi.fn((_sql: string, callback: (err: Error | null) => void) => callback(null));
    const done = vi.fn();
    const conn = { query };

    knexConfig.pool.afterCreate(conn, done);

    expect(query).toHaveBeenCalledWith("SET TIME ZONE 'UTC'", expect.any(Function));
    expect(done).toHaveBeenCalledWith(null, conn);
  });
});

describe('toCount', () => {
  it('normalizes driver count values', () => {
    expect(toCount(3)).toBe(3);
    expect(toCount('12')).toBe(12);
    expect(toCount(BigInt(5))).toBe(5);
    expect(toCount(null)).toBe(0);
    expect(toCount('n/a')).toBe(0);
  });
});
