/**
 * Queue permission keys. `rw` implies every other key.
 */
export type PermissionKey = 'ro' | 'move_into' | 'create' | 'note' | 'owner' | 'priority' | 'rw';

export interface PrecomputedQueueAccess {
  capability: PermissionKey;
  queueIds: readonly number[];
}

/**
 * The authenticated caller, produced once at the authentication boundary.
 */
export interface CallerIdentity {
  userId: number;
  isQueueAdmin?: boolean;
  accessibleQueues?: PrecomputedQueueAccess;
}

export type QueueScope =
  | { kind: 'all' }
  | { kind: 'queues'; queueIds: ReadonlySet<number> };

export interface PreferredQueue {
  id: number;
  name: string;
}
