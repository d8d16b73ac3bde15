import type { Knex } from 'knex';
import type { QueueScope } from '@deskflow/types';

/**
 * Queue ids to constrain a query to, or `null` for the admin sentinel.
 */
export function scopedQueueIds(scope: QueueScope): number[] | null {
  return scope.kind === 'all' ? null : [...scope.queueIds].sort((a, b) => a - b);
}

/**
 * Adds the queue constraint in place. Callers short-circuit an empty scope before querying.
 */
export function applyQueueScope(query: Knex.QueryBuilder, column: string, scope: QueueScope): void {
  const ids = scopedQueueIds(scope);
  if (ids !== null) {
    query.whereIn(column, ids);
  }
}
