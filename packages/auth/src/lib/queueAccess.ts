/**
 * Queue Access Resolver.
 *
 * Computes which queues a caller may act on for a capability. Admins get the `all` sentinel
 * instead of an enumerated set. Database failures surface as DependencyError and are never
 * read as "no access" or "full access".
 */

import type { Knex } from 'knex';
import type { CallerIdentity, PermissionKey, QueueScope } from '@deskflow/types';
import { AuthorizationError, DependencyError, isAppError } from '@deskflow/core/errors';
import defaultLogger, { type AppLogger } from '@deskflow/core/logger';
import GroupUser from '../models/groupUser';

export interface QueueAccessResolverOptions {
  knex: Knex | Knex.Transaction;
  adminUserIds: readonly number[];
  adminGroup: string;
  logger?: AppLogger;
}

export const ALL_QUEUES: QueueScope = { kind: 'all' };

export function queueScope(queueIds: Iterable<number>): QueueScope {
  return { kind: 'queues', queueIds: new Set(queueIds) };
}

export function scopeIncludes(scope: QueueScope, queueId: number): boolean {
  return scope.kind === 'all' || scope.queueIds.has(queueId);
}

export function isScopeEmpty(scope: QueueScope): boolean {
  return scope.kind === 'queues' && scope.queueIds.size === 0;
}

export class QueueAccessResolver {
  private readonly knex: Knex | Knex.Transaction;
  private readonly adminUserIds: ReadonlySet<number>;
  private readonly adminGroup: string;
  private readonly logger: AppLogger;

  constructor(options: QueueAccessResolverOptions) {
    this.knex = options.knex;
    this.adminUserIds = new Set(options.adminUserIds);
    this.adminGroup = options.adminGroup;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Admin means: flagged upstream, listed in the bypass set, or an active member of the admin group.
   */
  async isAdmin(caller: CallerIdentity): Promise<boolean> {
    if (caller.isQueueAdmin || this.adminUserIds.has(caller.userId)) {
      return true;
    }
    return this.isInGroup(caller.userId, this.adminGroup);
  }

  async resolveScope(caller: CallerIdentity, capability: PermissionKey): Promise<QueueScope> {
    if (caller.isQueueAdmin) {
      return ALL_QUEUES;
    }

    const precomputed = caller.accessibleQueues;
    if (precomputed && precomputed.capability === capability) {
      return queueScope(precomputed.queueIds);
    }

    if (await this.isAdmin(caller)) {
      return ALL_QUEUES;
    }

    const queueIds = await this.run('resolve accessible queues', { userId: caller.userId, capability }, () =>
      GroupUser.getQueueIdsForCapability(this.knex, caller.userId, capability)
    );

    this.logger.trace('[QueueAccess] resolved scope', {
      userId: caller.userId,
      capability,
      queueCount: queueIds.length,
    });
    return queueScope(queueIds);
  }

  async hasQueueAccess(caller: CallerIdentity, queueId: number, capability: PermissionKey): Promise<boolean> {
    const scope = await this.resolveScope(caller, capability);
    return scopeIncludes(scope, queueId);
  }

  /**
   * Explicit single-queue check. The error message never names the queue.
   */
  async assertQueueAccess(caller: CallerIdentity, queueId: number, capability: PermissionKey): Promise<void> {
    if (!(await this.hasQueueAccess(caller, queueId, capability))) {
      this.logger.warn('[QueueAccess] queue access denied', { userId: caller.userId, queueId, capability });
      throw new AuthorizationError();
    }
  }

  async assertAnyQueueAccess(caller: CallerIdentity, capability: PermissionKey): Promise<QueueScope> {
    const scope = await this.resolveScope(caller, capability);
    if (isScopeEmpty(scope)) {
      this.logger.warn('[QueueAccess] caller has no accessible queues', { userId: caller.userId, capability });
      throw new AuthorizationError('You do not have access to any queues');
    }
    return scope;
  }

  /**
   * Capability check against the queue a ticket currently sits in. Unknown tickets yield false.
   */
  async hasTicketPermission(userId: number, ticketId: number, capability: PermissionKey): Promise<boolean> {
    const caller: CallerIdentity = { userId };
    if (await this.isAdmin(caller)) {
      return true;
    }

    return this.run('check ticket permission', { userId, ticketId, capability }, async () => {
      const ticket = await this.knex('ticket')
        .where({ id: ticketId })
        .first<{ queue_id: number } | undefined>('queue_id');
      if (!ticket) {
        return false;
      }
      return GroupUser.hasQueueGrant(this.knex, userId, Number(ticket.queue_id), capability);
    });
  }

  async isInGroup(userId: number, groupName: string): Promise<boolean> {
    return this.run('check group membership', { userId, groupName }, () =>
      GroupUser.isInGroup(this.knex, userId, groupName)
    );
  }

  private async run<T>(operation: string, meta: Record<string, unknown>, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isAppError(error)) {
        throw error;
      }
      this.logger.error(`[QueueAccess] failed to ${operation}`, {
        ...meta,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new DependencyError(`Failed to ${operation}`, error);
    }
  }
}
