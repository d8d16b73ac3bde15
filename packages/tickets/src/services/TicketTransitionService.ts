/**
 * Transition Engine.
 *
 * Every write follows the same sequence: validate input, load the ticket, authorize against
 * its queue, resolve and validate the target values, snapshot, apply one UPDATE, re-read,
 * then append history. History is written best-effort after the ticket write commits.
 */

import type { Knex } from 'knex';
import type {
  CallerIdentity,
  HistoryType,
  ITicket,
  ITicketState,
  PermissionKey,
  TicketMutableFields,
  TicketSnapshot,
} from '@deskflow/types';
import type { QueueAccessResolver } from '@deskflow/auth';
import {
  AppError,
  DependencyError,
  NotFoundError,
  RequestAbortedError,
  ValidationError,
  toAppError,
} from '@deskflow/core/errors';
import defaultLogger, { type AppLogger } from '@deskflow/core/logger';
import Ticket, { snapshotOf } from '../models/ticket';
import Priority from '../models/priority';
import Queue from '../models/queue';
import User from '../models/user';
import Article from '../models/article';
import { StateCatalog } from '../lib/stateCatalog';
import { HistoryRecorder, changeMessage, excerpt } from '../lib/ticketHistory';
import { formatPendingUntil, parsePendingUntil } from '../lib/pendingTime';
import { isPendingState } from '../lib/stateTypes';

export interface OperationOptions {
  signal?: AbortSignal;
}

export interface UpdateStateInput {
  status: string;
  pendingUntil?: string | null;
}

export interface AddNoteInput {
  body: string;
  visibleForCustomer?: boolean;
  nextState?: string | null;
  pendingUntil?: string | null;
}

export interface BulkChanges {
  status?: string;
  pendingUntil?: string | null;
  priorityId?: number;
  queueId?: number;
  ownerId?: number;
  responsibleId?: number;
}

export interface BulkOutcome {
  ticketId: number;
  success: boolean;
  error?: { status: number; code: string; message: string };
}

export interface TicketTransitionServiceOptions {
  knex: Knex;
  accessResolver: QueueAccessResolver;
  stateCatalog: StateCatalog;
  historyRecorder: HistoryRecorder;
  timeZone: string;
  logger?: AppLogger;
  now?: () => Date;
}

interface StateChangePlan {
  state: ITicketState;
  untilTime: number;
}

interface PendingEntry {
  historyType: HistoryType;
  message: string;
}

export const NOTE_EXCERPT_LENGTH = 140;

function noteLabel(visibleForCustomer: boolean): string {
  return visibleForCustomer ? 'Customer-visible note' : 'Internal note';
}

export class TicketTransitionService {
  private readonly knex: Knex;
  private readonly access: QueueAccessResolver;
  private readonly states: StateCatalog;
  private readonly history: HistoryRecorder;
  private readonly timeZone: string;
  private readonly logger: AppLogger;
  private readonly now: () => Date;

  constructor(options: TicketTransitionServiceOptions) {
    this.knex = options.knex;
    this.access = options.accessResolver;
    this.states = options.stateCatalog;
    this.history = options.historyRecorder;
    this.timeZone = options.timeZone;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  async updateState(
    caller: CallerIdentity,
    ticketId: number,
    input: UpdateStateInput,
    options: OperationOptions = {}
  ): Promise<ITicket> {
    const status = input.status.trim();
    if (!status) {
      throw new ValidationError('status is required');
    }

    const ticket = await this.loadTicket(ticketId);
    await this.authorize(caller, ticket.queue_id, 'rw');
    const plan = await this.planStateChange(status, input.pendingUntil);

    this.throwIfAborted(options.signal, ticketId);
    const before = snapshotOf(ticket);
    const after = await this.applyUpdate(
      ticket,
      { ticket_state_id: plan.state.id, until_time: plan.untilTime },
      caller.userId
    );
    this.warnIfAbortedAfterWrite(options.signal, ticketId);

    await this.recordStateChange(before, after, caller.userId, null);
    return after;
  }

  async updatePriority(
    caller: CallerIdentity,
    ticketId: number,
    priorityId: number,
    options: OperationOptions = {}
  ): Promise<ITicket> {
    if (!Number.isInteger(priorityId) || priorityId <= 0) {
      throw new ValidationError('invalid priority id');
    }

    const ticket = await this.loadTicket(ticketId);
    await this.authorize(caller, ticket.queue_id, 'priority');
    const priority = await this.read('load priority', () => Priority.get(this.knex, priorityId));
    if (!priority) {
      throw new ValidationError('invalid priority id');
    }

    this.throwIfAborted(options.signal, ticketId);
    const before = snapshotOf(ticket);
    const after = await this.applyUpdate(ticket, { ticket_priority_id: priority.id }, caller.userId);
    this.warnIfAbortedAfterWrite(options.signal, ticketId);

    if (before.ticket_priority_id !== after.ticket_priority_id) {
      const previous = await this.nameOr(
        () => Priority.getName(this.knex, before.ticket_priority_id),
        `priority ${before.ticket_priority_id}`
      );
      await this.history.tryRecord({
        before,
        after,
        historyType: 'PriorityUpdate',
        message: changeMessage('Priority', previous, priority.name),
        actorId: caller.userId,
      });
    } else {
      this.logUnchanged(ticketId, 'PriorityUpdate');
    }
    return after;
  }

  /**
   * Requires `rw` on the current queue and `move_into` on the target. A target the caller
   * cannot reach is refused with 403 before its existence is checked.
   */
  async moveQueue(
    caller: CallerIdentity,
    ticketId: number,
    queueId: number,
    options: OperationOptions = {}
  ): Promise<ITicket> {
    if (!Number.isInteger(queueId) || queueId <= 0) {
      throw new ValidationError('invalid queue id');
    }

    const ticket = await this.loadTicket(ticketId);
    await this.authorize(caller, ticket.queue_id, 'rw');
    await this.authorize(caller, queueId, 'move_into');
    const target = await this.read('load queue', () => Queue.get(this.knex, queueId));
    if (!target) {
      throw new ValidationError('invalid queue id');
    }

    this.throwIfAborted(options.signal, ticketId);
    const before = snapshotOf(ticket);
    const after = await this.applyUpdate(ticket, { queue_id: target.id }, caller.userId);
    this.warnIfAbortedAfterWrite(options.signal, ticketId);

    if (before.queue_id !== after.queue_id) {
      const previous = await this.nameOr(() => Queue.getName(this.knex, before.queue_id), `queue ${before.queue_id}`);
      await this.history.tryRecord({
        before,
        after,
        historyType: 'Move',
        message: changeMessage('Queue', previous, target.name),
        actorId: caller.userId,
      });
    } else {
      this.logUnchanged(ticketId, 'Move');
    }
    return after;
  }

  async assignOwner(
    caller: CallerIdentity,
    ticketId: number,
    agentId: number,
    options: OperationOptions = {}
  ): Promise<ITicket> {
    return this.assignAgent(caller, ticketId, agentId, 'owner', options);
  }

  async assignResponsible(
    caller: CallerIdentity,
    ticketId: number,
    agentId: number,
    options: OperationOptions = {}
  ): Promise<ITicket> {
    return this.assignAgent(caller, ticketId, agentId, 'responsible', options);
  }

  /**
   * Adds an article and, when `nextState` is given, changes state in the same write.
   * Changing state through a note additionally requires `rw`.
   */
  async addNote(
    caller: CallerIdentity,
    ticketId: number,
    input: AddNoteInput,
    options: OperationOptions = {}
  ): Promise<{ ticket: ITicket; articleId: number }> {
    const body = input.body.trim();
    if (!body) {
      throw new ValidationError('note body is required');
    }
    const nextState = input.nextState?.trim() ?? '';
    const visibleForCustomer = input.visibleForCustomer ?? false;

    const ticket = await this.loadTicket(ticketId);
    await this.authorize(caller, ticket.queue_id, 'note');
    if (nextState) {
      await this.authorize(caller, ticket.queue_id, 'rw');
    }
    const plan = nextState ? await this.planStateChange(nextState, input.pendingUntil) : null;

    this.throwIfAborted(options.signal, ticketId);
    const before = snapshotOf(ticket);
    const changeTime = this.now().toISOString();

    let articleId: number;
    try {
      articleId = await this.knex.transaction(async (trx) => {
        const id = await Article.create(trx, {
          ticketId,
          body,
          visibleForCustomer,
          actorId: caller.userId,
          createTime: changeTime,
        });
        const fields: TicketMutableFields = plan
          ? { ticket_state_id: plan.state.id, until_time: plan.untilTime }
          : {};
        await Ticket.update(trx, ticketId, fields, caller.userId, changeTime);
        return id;
      });
    } catch (error) {
      throw this.writeFailure(ticketId, error);
    }

    const after = await this.reload(ticketId);
    this.warnIfAbortedAfterWrite(options.signal, ticketId);

    const label = noteLabel(visibleForCustomer);
    const summary = excerpt(body, NOTE_EXCERPT_LENGTH);
    await this.history.tryRecord({
      before,
      after,
      articleId,
      historyType: 'AddNote',
      message: summary ? `${label}: ${summary}` : label,
      actorId: caller.userId,
    });

    if (plan) {
      await this.recordStateChange(before, after, caller.userId, articleId);
    }
    return { ticket: after, articleId };
  }

  /**
   * Applies the same changes to many tickets through the single-ticket operations,
   * so every change is authorized and audited. One failure does not stop the rest.
   */
  async bulkUpdate(
    caller: CallerIdentity,
    ticketIds: readonly number[],
    changes: BulkChanges,
    options: OperationOptions = {}
  ): Promise<BulkOutcome[]> {
    const ids = [...new Set(ticketIds)];
    if (ids.length === 0) {
      throw new ValidationError('no tickets selected');
    }
    const hasChange =
      changes.status !== undefined ||
      changes.priorityId !== undefined ||
      changes.queueId !== undefined ||
      changes.ownerId !== undefined ||
      changes.responsibleId !== undefined;
    if (!hasChange) {
      throw new ValidationError('no changes requested');
    }

    const outcomes: BulkOutcome[] = [];
    for (const ticketId of ids) {
      try {
        if (changes.status !== undefined) {
          const stateInput = { status: changes.status, pendingUntil: changes.pendingUntil };
          await this.updateState(caller, ticketId, stateInput, options);
        }
        if (changes.priorityId !== undefined) {
          await this.updatePriority(caller, ticketId, changes.priorityId, options);
        }
        if (changes.queueId !== undefined) {
          await this.moveQueue(caller, ticketId, changes.queueId, options);
        }
        if (changes.ownerId !== undefined) {
          await this.assignOwner(caller, ticketId, changes.ownerId, options);
        }
        if (changes.responsibleId !== undefined) {
          await this.assignResponsible(caller, ticketId, changes.responsibleId, options);
        }
        outcomes.push({ ticketId, success: true });
      } catch (error) {
        const appError = toAppError(error);
        if (appError instanceof RequestAbortedError) {
          throw appError;
        }
        outcomes.push({
          ticketId,
          success: false,
          error: { status: appError.status, code: appError.code, message: appError.message },
        });
      }
    }

    this.logger.info('[TicketTransition] bulk update finished', {
      userId: caller.userId,
      requested: ids.length,
      succeeded: outcomes.filter((outcome) => outcome.success).length,
    });
    return outcomes;
  }

  private async assignAgent(
    caller: CallerIdentity,
    ticketId: number,
    agentId: number,
    role: 'owner' | 'responsible',
    options: OperationOptions
  ): Promise<ITicket> {
    if (!Number.isInteger(agentId) || agentId <= 0) {
      throw new ValidationError('invalid agent id');
    }

    const ticket = await this.loadTicket(ticketId);
    await this.authorize(caller, ticket.queue_id, 'rw');
    const agent = await this.read('load agent', () => User.getValid(this.knex, agentId));
    if (!agent) {
      throw new ValidationError('invalid agent id');
    }
    const eligible = await this.access.hasQueueAccess({ userId: agent.id }, ticket.queue_id, 'owner');
    if (!eligible) {
      throw new ValidationError('agent lacks owner permission on this queue');
    }

    this.throwIfAborted(options.signal, ticketId);
    const before = snapshotOf(ticket);
    const fields: TicketMutableFields = role === 'owner' ? { user_id: agent.id } : { responsible_user_id: agent.id };
    const after = await this.applyUpdate(ticket, fields, caller.userId);
    this.warnIfAbortedAfterWrite(options.signal, ticketId);

    const previousId = role === 'owner' ? before.user_id : before.responsible_user_id;
    const historyType: HistoryType = role === 'owner' ? 'OwnerUpdate' : 'ResponsibleUpdate';
    if (previousId === agent.id) {
      this.logUnchanged(ticketId, historyType);
      return after;
    }

    const previous =
      previousId === null
        ? ''
        : await this.nameOr(() => User.getLogin(this.knex, previousId), `user ${previousId}`);
    await this.history.tryRecord({
      before,
      after,
      historyType,
      message: changeMessage(role === 'owner' ? 'Owner' : 'Responsible', previous, agent.login),
      actorId: caller.userId,
    });
    return after;
  }

  /**
   * Resolves the target state and the until_time it requires. Pending states need a
   * parseable deadline; every other state clears it.
   */
  private async planStateChange(status: string, pendingUntilRaw: string | null | undefined): Promise<StateChangePlan> {
    const resolution = await this.states.resolveState(status, 0);
    if (resolution.kind !== 'resolved') {
      throw resolution.reason;
    }
    const state = resolution.state;

    if (!isPendingState(state.name, state.type_id)) {
      return { state, untilTime: 0 };
    }

    const raw = pendingUntilRaw?.trim() ?? '';
    if (!raw) {
      throw new ValidationError('pending_until is required for pending states');
    }
    const untilTime = parsePendingUntil(raw, this.timeZone);
    if (untilTime <= 0) {
      throw new ValidationError('Invalid pending time format');
    }
    return { state, untilTime };
  }

  private async recordStateChange(
    before: TicketSnapshot,
    after: ITicket,
    actorId: number,
    articleId: number | null
  ): Promise<void> {
    if (before.ticket_state_id !== after.ticket_state_id) {
      const [previousName, nextName] = await Promise.all([
        this.states.stateName(before.ticket_state_id),
        this.states.stateName(after.ticket_state_id),
      ]);
      await this.history.tryRecord({
        before,
        after,
        articleId,
        historyType: 'StateUpdate',
        message: changeMessage('State', previousName, nextName) || `State set to ${nextName}`,
        actorId,
      });
    } else {
      this.logUnchanged(after.id, 'StateUpdate');
    }

    const pending = this.pendingEntry(before.until_time, after.until_time);
    if (pending) {
      await this.history.tryRecord({ before, after, articleId, ...pending, actorId });
    }
  }

  private pendingEntry(previousUntil: number, nextUntil: number): PendingEntry | null {
    if (previousUntil === nextUntil) {
      return null;
    }
    if (nextUntil > 0) {
      return {
        historyType: 'SetPendingTime',
        message: `Pending until ${formatPendingUntil(nextUntil, this.timeZone)}`,
      };
    }
    return previousUntil > 0 ? { historyType: 'SetPendingTime', message: 'Pending time cleared' } : null;
  }

  private async loadTicket(ticketId: number): Promise<ITicket> {
    if (!Number.isInteger(ticketId) || ticketId <= 0) {
      throw new ValidationError('invalid ticket id');
    }
    const ticket = await this.read('load ticket', () => Ticket.get(this.knex, ticketId));
    if (!ticket) {
      throw new NotFoundError('Ticket', { ticketId });
    }
    return ticket;
  }

  private async authorize(caller: CallerIdentity, queueId: number, capability: PermissionKey): Promise<void> {
    await this.access.assertQueueAccess(caller, queueId, capability);
  }

  private async applyUpdate(ticket: ITicket, fields: TicketMutableFields, actorId: number): Promise<ITicket> {
    try {
      await Ticket.update(this.knex, ticket.id, fields, actorId, this.now().toISOString());
    } catch (error) {
      throw this.writeFailure(ticket.id, error);
    }
    return this.reload(ticket.id);
  }

  private async reload(ticketId: number): Promise<ITicket> {
    const ticket = await this.read('reload ticket', () => Ticket.get(this.knex, ticketId));
    if (!ticket) {
      throw new DependencyError('Ticket disappeared after update', undefined, { ticketId });
    }
    return ticket;
  }

  private async read<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new DependencyError(`Failed to ${operation}`, error);
    }
  }

  private async nameOr(fn: () => Promise<string | undefined>, fallback: string): Promise<string> {
    try {
      return (await fn()) ?? fallback;
    } catch (error) {
      this.logger.warn('[TicketTransition] name lookup failed', {
        fallback,
        error: error instanceof Error ? error.message : String(error),
      });
      return fallback;
    }
  }

  private writeFailure(ticketId: number, error: unknown): DependencyError {
    this.logger.error('[TicketTransition] ticket write failed', {
      ticketId,
      error: error instanceof Error ? error.message : String(error),
    });
    return new DependencyError('Failed to update ticket', error, { ticketId });
  }

  private throwIfAborted(signal: AbortSignal | undefined, ticketId: number): void {
    if (signal?.aborted) {
      this.logger.info('[TicketTransition] request cancelled before write', { ticketId });
      throw new RequestAbortedError();
    }
  }

  private warnIfAbortedAfterWrite(signal: AbortSignal | undefined, ticketId: number): void {
    if (signal?.aborted) {
      this.logger.warn('[TicketTransition] request cancelled after ticket write; recording history anyway', {
        ticketId,
      });
    }
  }

  private logUnchanged(ticketId: number, historyType: HistoryType): void {
    this.logger.debug('[TicketTransition] value unchanged, no history entry', {
      ticketId,
      historyType,
      suppressed: true,
    });
  }
}
