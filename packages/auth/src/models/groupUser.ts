/**
 * Permission Store: read access to (user, group, key) grants and the queues they reach.
 *
 * Only grants with `permission_value = 1` and queues with `valid_id = 1` count.
 */

import type { Knex } from 'knex';
import type { PermissionKey } from '@deskflow/types';
import { grantingKeys } from '../lib/permissionKeys';

interface QueueIdRow {
  id: number;
}

export interface QueueGrantRow {
  identifier: string;
  queue_id: number;
  queue_name: string;
  permission_key: string;
}

const GroupUser = {
  /**
   * Queue ids reachable by a user for a capability (exact key or `rw`).
   */
  getQueueIdsForCapability: async (
    knexOrTrx: Knex | Knex.Transaction,
    userId: number,
    capability: PermissionKey
  ): Promise<number[]> => {
    const rows = await knexOrTrx('group_user as gu')
      .join('queue as q', 'q.group_id', 'gu.group_id')
      .where('gu.user_id', userId)
      .andWhere('gu.permission_value', 1)
      .whereIn('gu.permission_key', grantingKeys(capability))
      .andWhere('q.valid_id', 1)
      .distinct<QueueIdRow[]>('q.id as id')
      .orderBy('q.id', 'asc');

    return rows.map((row) => Number(row.id));
  },

  /**
   * Whether a user holds a capability on one queue's group.
   */
  hasQueueGrant: async (
    knexOrTrx: Knex | Knex.Transaction,
    userId: number,
    queueId: number,
    capability: PermissionKey
  ): Promise<boolean> => {
    const row = await knexOrTrx('group_user as gu')
      .join('queue as q', 'q.group_id', 'gu.group_id')
      .where('gu.user_id', userId)
      .andWhere('q.id', queueId)
      .andWhere('q.valid_id', 1)
      .andWhere('gu.permission_value', 1)
      .whereIn('gu.permission_key', grantingKeys(capability))
      .first<QueueIdRow | undefined>('q.id as id');

    return row !== undefined;
  },

  /**
   * Membership with any active grant in a group, matched by name without regard to case.
   */
  isInGroup: async (
    knexOrTrx: Knex | Knex.Transaction,
    userId: number,
    groupName: string
  ): Promise<boolean> => {
    const row = await knexOrTrx('group_user as gu')
      .join('permission_groups as g', 'g.id', 'gu.group_id')
      .where('gu.user_id', userId)
      .andWhere('gu.permission_value', 1)
      .andWhere('g.valid_id', 1)
      .whereRaw('lower(g.name) = ?', [groupName.trim().toLowerCase()])
      .first<{ group_id: number } | undefined>('gu.group_id as group_id');

    return row !== undefined;
  },

  /**
   * Queue grants held by customer companies (`group_customer`).
   */
  getCustomerQueueGrants: async (
    knexOrTrx: Knex | Knex.Transaction,
    customerIds: readonly string[]
  ): Promise<QueueGrantRow[]> => {
    if (customerIds.length === 0) return [];
    return knexOrTrx('group_customer as gc')
      .join('queue as q', 'q.group_id', 'gc.group_id')
      .whereIn('gc.customer_id', [...customerIds])
      .andWhere('gc.permission_value', 1)
      .andWhere('q.valid_id', 1)
      .select<QueueGrantRow[]>(
        'gc.customer_id as identifier',
        'q.id as queue_id',
        'q.name as queue_name',
        'gc.permission_key as permission_key'
      );
  },

  /**
   * Queue grants held by individual customer logins (`group_customer_user`).
   */
  getCustomerUserQueueGrants: async (
    knexOrTrx: Knex | Knex.Transaction,
    logins: readonly string[]
  ): Promise<QueueGrantRow[]> => {
    if (logins.length === 0) return [];
    return knexOrTrx('group_customer_user as gcu')
      .join('queue as q', 'q.group_id', 'gcu.group_id')
      .whereIn('gcu.user_id', [...logins])
      .andWhere('gcu.permission_value', 1)
      .andWhere('q.valid_id', 1)
      .select<QueueGrantRow[]>(
        'gcu.user_id as identifier',
        'q.id as queue_id',
        'q.name as queue_name',
        'gcu.permission_key as permission_key'
      );
  },
};

export default GroupUser;
