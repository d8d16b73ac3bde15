/**
 * Query Filters: every list, detail and aggregate read is constrained to the caller's
 * accessible queues before it runs. An explicitly named queue outside that set is a 403.
 *
 * Aggregates degrade to zero or empty on query failure; scope resolution failures propagate.
 */

import type { Knex } from 'knex';
import type {
  CallerIdentity,
  ITicket,
  ITicketHistoryEntry,
  ITicketListFilters,
  QueueScope,
  TicketStateTypeFilter,
} from '@deskflow/types';
import { queueScope, isScopeEmpty, type QueueAccessResolver } from '@deskflow/auth';
import { toCount } from '@deskflow/db';
import { AppError, DependencyError, NotFoundError, getErrorMessage } from '@deskflow/core/errors';
import defaultLogger, { type AppLogger } from '@deskflow/core/logger';
import Ticket, { normalizeTicket, type TicketRow } from '../models/ticket';
import TicketHistory from '../models/ticketHistory';
import { applyQueueScope } from '../lib/queueScopeFilter';
import {
  computeAutoCloseMeta,
  computeReminderMeta,
  DEFAULT_PENDING_OFFSET_MS,
  type AutoCloseMeta,
  type ReminderMeta,
} from '../lib/pendingTime';
import {
  STATE_TYPE,
  classifyStateType,
  isPendingReminderState,
  isPendingState,
  stateTypeIdsForFilter,
  type StateTypeName,
} from '../lib/stateTypes';

export const DEFAULT_PAGE_SIZE = 25;
export const MAX_PAGE_SIZE = 100;
export const RECENT_TICKET_LIMIT = 10;

type JoinedTicketRow = TicketRow & {
  state_name: string;
  state_type_id: number;
  queue_name: string;
  priority_name: string;
};

interface CountRow {
  count: number | string;
}

interface TypeCountRow extends CountRow {
  type_id: number;
  state_name: string;
}

interface NamedCountRow extends CountRow {
  id: number;
  name: string;
}

interface QueueTypeCountRow extends NamedCountRow {
  type_id: number | null;
  state_name: string | null;
}

export interface TicketView {
  ticket: ITicket;
  stateName: string;
  stateType: StateTypeName | 'unknown';
  queueName: string;
  priorityName: string;
  autoClose: AutoCloseMeta;
  reminder: ReminderMeta;
}

export interface TicketListResult {
  tickets: TicketView[];
  total: number;
  page: number;
  perPage: number;
}

export interface DashboardStats {
  overview: { total: number; new: number; open: number; pending: number; closed: number };
  byQueue: { queueId: number; queueName: string; count: number }[];
  byPriority: { priorityId: number; priorityName: string; count: number }[];
  recent: { id: number; tn: string; title: string; queueName: string; stateName: string; createTime: string }[];
}

export interface QueueStatistic {
  queueId: number;
  queueName: string;
  total: number;
  open: number;
  pending: number;
  backlog: number;
}

export interface PendingReminderItem {
  ticketId: number;
  tn: string;
  title: string;
  queueId: number;
  queueName: string;
  ownerId: number;
  untilTime: number;
  reminder: ReminderMeta;
}

export interface TicketQueryServiceOptions {
  knex: Knex;
  accessResolver: QueueAccessResolver;
  logger?: AppLogger;
  now?: () => Date;
}

const OPEN_TYPE_IDS: number[] = [STATE_TYPE.new, STATE_TYPE.open];

// SQL form of the name half of isPendingState; `_` matches the space or hyphen in legacy names.
const PENDING_NAME_PATTERNS = ['%pending_reminder%', '%pending_auto%'];

function orWherePendingName(builder: Knex.QueryBuilder): void {
  for (const pattern of PENDING_NAME_PATTERNS) {
    builder.orWhereRaw('lower(s.name) like ?', [pattern]);
  }
}

function applyStateTypeFilter(query: Knex.QueryBuilder, filter: TicketStateTypeFilter): void {
  if (filter === 'pending') {
    query.where((builder) => {
      builder.whereIn('s.type_id', stateTypeIdsForFilter('pending'));
      orWherePendingName(builder);
    });
    return;
  }
  query.whereIn('s.type_id', stateTypeIdsForFilter(filter)).whereNot((builder) => {
    orWherePendingName(builder);
  });
}

const JOINED_COLUMNS = [
  't.*',
  's.name as state_name',
  's.type_id as state_type_id',
  'q.name as queue_name',
  'p.name as priority_name',
];

function emptyOverview(): DashboardStats['overview'] {
  return { total: 0, new: 0, open: 0, pending: 0, closed: 0 };
}

export class TicketQueryService {
  private readonly knex: Knex;
  private readonly access: QueueAccessResolver;
  private readonly logger: AppLogger;
  private readonly now: () => Date;

  constructor(options: TicketQueryServiceOptions) {
    this.knex = options.knex;
    this.access = options.accessResolver;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  async listTickets(caller: CallerIdentity, filters: ITicketListFilters = {}): Promise<TicketListResult> {
    const perPage = Math.min(Math.max(filters.perPage ?? DEFAULT_PAGE_SIZE, 1), MAX_PAGE_SIZE);
    const page = Math.max(filters.page ?? 1, 1);
    const scope = await this.scopeFor(caller, filters.queueId);
    if (isScopeEmpty(scope)) {
      return { tickets: [], total: 0, page, perPage };
    }

    const filtered = () => {
      const query = this.joinedTickets();
      applyQueueScope(query, 't.queue_id', scope);
      if (filters.stateType) {
        applyStateTypeFilter(query, filters.stateType);
      }
      return query;
    };

    try {
      const [countRows, rows] = await Promise.all([
        filtered().count<CountRow[]>('t.id as count'),
        filtered()
          .orderBy('t.id', 'desc')
          .limit(perPage)
          .offset((page - 1) * perPage)
          .select<JoinedTicketRow[]>(...JOINED_COLUMNS),
      ]);

      const now = this.now();
      return {
        tickets: rows.map((row) => this.toView(row, now)),
        total: toCount(countRows[0]?.count),
        page,
        perPage,
      };
    } catch (error) {
      throw new DependencyError('Failed to list tickets', error);
    }
  }

  /**
   * Looks a ticket up by id or ticket number. Digit-only input is tried as an id first.
   */
  async getTicket(caller: CallerIdentity, idOrNumber: number | string): Promise<TicketView> {
    const ticket = await this.findTicket(idOrNumber);
    await this.access.assertQueueAccess(caller, ticket.queue_id, 'ro');

    const row = await this.read('load ticket detail', () =>
      this.joinedTickets()
        .where('t.id', ticket.id)
        .first<JoinedTicketRow | undefined>(...JOINED_COLUMNS)
    );
    if (!row) {
      throw new NotFoundError('Ticket', { ticketId: ticket.id });
    }
    return this.toView(row, this.now());
  }

  async getTicketHistory(caller: CallerIdentity, ticketId: number): Promise<ITicketHistoryEntry[]> {
    const ticket = await this.findTicket(ticketId);
    await this.access.assertQueueAccess(caller, ticket.queue_id, 'ro');
    return this.read('load ticket history', () => TicketHistory.listForTicket(this.knex, ticket.id));
  }

  async dashboardStats(caller: CallerIdentity, options: { queueId?: number } = {}): Promise<DashboardStats> {
    const scope = await this.scopeFor(caller, options.queueId);
    if (isScopeEmpty(scope)) {
      return { overview: emptyOverview(), byQueue: [], byPriority: [], recent: [] };
    }

    const [overview, byQueue, byPriority, recent] = await Promise.all([
      this.degrade('overview', emptyOverview(), () => this.overview(scope)),
      this.degrade('tickets by queue', [], () => this.countByQueue(scope)),
      this.degrade('tickets by priority', [], () => this.countByPriority(scope)),
      this.degrade('recent tickets', [], () => this.recentTickets(scope)),
    ]);
    return { overview, byQueue, byPriority, recent };
  }

  /**
   * Per-queue counts over valid queues, including queues without tickets.
   * Backlog is open tickets created more than 24h ago.
   */
  async queueStatistics(caller: CallerIdentity, options: { queueId?: number } = {}): Promise<QueueStatistic[]> {
    const scope = await this.scopeFor(caller, options.queueId);
    if (isScopeEmpty(scope)) {
      return [];
    }

    return this.degrade('queue statistics', [], async () => {
      const cutoff = new Date(this.now().getTime() - DEFAULT_PENDING_OFFSET_MS).toISOString();

      const byType = this.knex('queue as q')
        .leftJoin('ticket as t', 't.queue_id', 'q.id')
        .leftJoin('ticket_state as s', 's.id', 't.ticket_state_id')
        .where('q.valid_id', 1)
        .groupBy('q.id', 'q.name', 's.type_id', 's.name');
      applyQueueScope(byType, 'q.id', scope);

      const backlog = this.knex('ticket as t')
        .join('ticket_state as s', 's.id', 't.ticket_state_id')
        .whereIn('s.type_id', OPEN_TYPE_IDS)
        .whereNot((builder) => {
          orWherePendingName(builder);
        })
        .andWhere('t.create_time', '<', cutoff)
        .groupBy('t.queue_id');
      applyQueueScope(backlog, 't.queue_id', scope);

      const [typeRows, backlogRows] = await Promise.all([
        byType
          .select('q.id as id', 'q.name as name', 's.type_id as type_id', 's.name as state_name')
          .count<QueueTypeCountRow[]>('t.id as count'),
        backlog.select('t.queue_id as id').count<{ id: number; count: number | string }[]>('t.id as count'),
      ]);

      const stats = new Map<number, QueueStatistic>();
      for (const row of typeRows) {
        const queueId = Number(row.id);
        const stat = stats.get(queueId) ?? {
          queueId,
          queueName: row.name,
          total: 0,
          open: 0,
          pending: 0,
          backlog: 0,
        };
        const count = toCount(row.count);
        const typeId = row.type_id == null ? null : Number(row.type_id);
        if (typeId !== null) {
          stat.total += count;
          if (isPendingState(row.state_name ?? '', typeId)) stat.pending += count;
          else if (OPEN_TYPE_IDS.includes(typeId)) stat.open += count;
        }
        stats.set(queueId, stat);
      }
      for (const row of backlogRows) {
        const stat = stats.get(Number(row.id));
        if (stat) stat.backlog = toCount(row.count);
      }

      return [...stats.values()].sort((a, b) => b.total - a.total || a.queueName.localeCompare(b.queueName));
    });
  }

  /**
   * Pending-reminder tickets whose stored reminder time has passed. Reported only; no state changes.
   */
  async pendingReminderFeed(caller: CallerIdentity): Promise<PendingReminderItem[]> {
    const scope = await this.access.resolveScope(caller, 'ro');
    if (isScopeEmpty(scope)) {
      return [];
    }

    const now = this.now();
    const nowEpoch = Math.floor(now.getTime() / 1000);
    const rows = await this.read('load pending reminders', () => {
      const query = this.joinedTickets()
        .where((builder) => {
          builder
            .where('s.type_id', STATE_TYPE.pendingReminder)
            .orWhereRaw('lower(s.name) like ?', ['%pending_reminder%']);
        })
        .andWhere('t.until_time', '>', 0)
        .andWhere('t.until_time', '<=', nowEpoch)
        .orderBy('t.until_time', 'asc')
        .orderBy('t.id', 'asc');
      applyQueueScope(query, 't.queue_id', scope);
      return query.select<JoinedTicketRow[]>(...JOINED_COLUMNS);
    });

    return rows
      .filter((row) => isPendingReminderState(row.state_name, Number(row.state_type_id)))
      .map((row) => {
        const ticket = this.ticketFromRow(row);
        return {
          ticketId: ticket.id,
          tn: ticket.tn,
          title: ticket.title,
          queueId: ticket.queue_id,
          queueName: row.queue_name,
          ownerId: ticket.user_id,
          untilTime: ticket.until_time,
          reminder: computeReminderMeta(ticket, row.state_name, Number(row.state_type_id), now),
        };
      });
  }

  private async scopeFor(caller: CallerIdentity, queueId: number | undefined): Promise<QueueScope> {
    if (queueId !== undefined) {
      await this.access.assertQueueAccess(caller, queueId, 'ro');
      return queueScope([queueId]);
    }
    return this.access.resolveScope(caller, 'ro');
  }

  private joinedTickets(): Knex.QueryBuilder {
    return this.knex('ticket as t')
      .join('ticket_state as s', 's.id', 't.ticket_state_id')
      .join('queue as q', 'q.id', 't.queue_id')
      .join('ticket_priority as p', 'p.id', 't.ticket_priority_id');
  }

  private async findTicket(idOrNumber: number | string): Promise<ITicket> {
    const value = String(idOrNumber).trim();
    const ticket = await this.read('load ticket', async () => {
      if (/^\d+$/.test(value)) {
        const byId = await Ticket.get(this.knex, Number(value));
        if (byId) return byId;
      }
      return value ? Ticket.getByNumber(this.knex, value) : undefined;
    });
    if (!ticket) {
      throw new NotFoundError('Ticket', { ticket: value });
    }
    return ticket;
  }

  private ticketFromRow(row: JoinedTicketRow): ITicket {
    const {
      state_name: _stateName,
      state_type_id: _stateTypeId,
      queue_name: _queueName,
      priority_name: _priorityName,
      ...ticketRow
    } = row;
    return normalizeTicket(ticketRow);
  }

  private toView(row: JoinedTicketRow, now: Date): TicketView {
    const ticket = this.ticketFromRow(row);
    const stateTypeId = Number(row.state_type_id);
    return {
      ticket,
      stateName: row.state_name,
      stateType: classifyStateType(stateTypeId),
      queueName: row.queue_name,
      priorityName: row.priority_name,
      autoClose: computeAutoCloseMeta(ticket, row.state_name, stateTypeId, now),
      reminder: computeReminderMeta(ticket, row.state_name, stateTypeId, now),
    };
  }

  private async overview(scope: QueueScope): Promise<DashboardStats['overview']> {
    const query = this.knex('ticket as t')
      .join('ticket_state as s', 's.id', 't.ticket_state_id')
      .groupBy('s.type_id', 's.name');
    applyQueueScope(query, 't.queue_id', scope);
    const rows = await query
      .select('s.type_id as type_id', 's.name as state_name')
      .count<TypeCountRow[]>('t.id as count');

    const overview = emptyOverview();
    for (const row of rows) {
      const count = toCount(row.count);
      const typeId = Number(row.type_id);
      overview.total += count;
      if (isPendingState(row.state_name, typeId)) {
        overview.pending += count;
        continue;
      }
      switch (typeId) {
        case STATE_TYPE.new:
          overview.new += count;
          break;
        case STATE_TYPE.open:
          overview.open += count;
          break;
        case STATE_TYPE.closed:
          overview.closed += count;
          break;
        default:
          break;
      }
    }
    return overview;
  }

  private async countByQueue(scope: QueueScope): Promise<DashboardStats['byQueue']> {
    const query = this.knex('ticket as t').join('queue as q', 'q.id', 't.queue_id').groupBy('q.id', 'q.name');
    applyQueueScope(query, 't.queue_id', scope);
    const rows = await query.select('q.id as id', 'q.name as name').count<NamedCountRow[]>('t.id as count');
    return rows
      .map((row) => ({ queueId: Number(row.id), queueName: row.name, count: toCount(row.count) }))
      .sort((a, b) => b.count - a.count || a.queueName.localeCompare(b.queueName));
  }

  private async countByPriority(scope: QueueScope): Promise<DashboardStats['byPriority']> {
    const query = this.knex('ticket as t')
      .join('ticket_priority as p', 'p.id', 't.ticket_priority_id')
      .groupBy('p.id', 'p.name');
    applyQueueScope(query, 't.queue_id', scope);
    const rows = await query.select('p.id as id', 'p.name as name').count<NamedCountRow[]>('t.id as count');
    return rows
      .map((row) => ({ priorityId: Number(row.id), priorityName: row.name, count: toCount(row.count) }))
      .sort((a, b) => a.priorityId - b.priorityId);
  }

  private async recentTickets(scope: QueueScope): Promise<DashboardStats['recent']> {
    const query = this.joinedTickets()
      .orderBy('t.create_time', 'desc')
      .orderBy('t.id', 'desc')
      .limit(RECENT_TICKET_LIMIT);
    applyQueueScope(query, 't.queue_id', scope);
    const rows = await query.select<JoinedTicketRow[]>(...JOINED_COLUMNS);
    return rows.map((row) => ({
      id: Number(row.id),
      tn: row.tn,
      title: row.title,
      queueName: row.queue_name,
      stateName: row.state_name,
      createTime: row.create_time,
    }));
  }

  private async read<T>(operation: string, fn: () => PromiseLike<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new DependencyError(`Failed to ${operation}`, error);
    }
  }

  private async degrade<T>(aggregate: string, fallback: T, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.logger.warn('[TicketQuery] aggregate query failed, returning empty result', {
        aggregate,
        error: getErrorMessage(error),
      });
      return fallback;
    }
  }
}
