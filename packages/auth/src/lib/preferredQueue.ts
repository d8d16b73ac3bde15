import type { Knex } from 'knex';
import type { PreferredQueue } from '@deskflow/types';
import GroupUser, { type QueueGrantRow } from '../models/groupUser';
import { rankQueuePermission } from './permissionKeys';

interface Candidate {
  rank: number;
  queue: PreferredQueue;
}

/**
 * Picks one queue per identifier: strongest permission rank wins, then the lowest queue id.
 * The result does not depend on row order.
 */
export function pickPreferredQueues(rows: readonly QueueGrantRow[]): Map<string, PreferredQueue> {
  const best = new Map<string, Candidate>();

  for (const row of rows) {
    const identifier = row.identifier.trim();
    if (!identifier) continue;

    const candidate: Candidate = {
      rank: rankQueuePermission(row.permission_key),
      queue: { id: Number(row.queue_id), name: row.queue_name },
    };
    const current = best.get(identifier);
    if (
      !current ||
      candidate.rank < current.rank ||
      (candidate.rank === current.rank && candidate.queue.id < current.queue.id)
    ) {
      best.set(identifier, candidate);
    }
  }

  const result = new Map<string, PreferredQueue>();
  for (const [identifier, candidate] of best) {
    result.set(identifier, candidate.queue);
  }
  return result;
}

function uniqueIdentifiers(values: readonly string[]): string[] {
  return [...new Set(values.map((value) => value.trim()).filter((value) => value.length > 0))];
}

export async function loadPreferredQueuesForCustomers(
  knexOrTrx: Knex | Knex.Transaction,
  customerIds: readonly string[]
): Promise<Map<string, PreferredQueue>> {
  const rows = await GroupUser.getCustomerQueueGrants(knexOrTrx, uniqueIdentifiers(customerIds));
  return pickPreferredQueues(rows);
}

export async function loadPreferredQueuesForCustomerUsers(
  knexOrTrx: Knex | Knex.Transaction,
  logins: readonly string[]
): Promise<Map<string, PreferredQueue>> {
  const rows = await GroupUser.getCustomerUserQueueGrants(knexOrTrx, uniqueIdentifiers(logins));
  return pickPreferredQueues(rows);
}
