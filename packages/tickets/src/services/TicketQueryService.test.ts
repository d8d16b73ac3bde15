import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { AppLogger } from '@deskflow/core/logger';
import { QueueAccessResolver } from '@deskflow/auth';
import { createTestDatabase, type TestDatabase } from '@deskflow/db/test-utils';
import type { CallerIdentity } from '@deskflow/types';
import { TicketQueryService } from './TicketQueryService';
import { createMockLogger } from '../test-utils/logger';

const NOW = new Date('2024-03-10T12:00:00.000Z');
const nowEpoch = Math.floor(NOW.getTime() / 1000);

const ALPHA_AGENT: CallerIdentity = { userId: 10 };
const BETA_AGENT: CallerIdentity = { userId: 11 };
const NO_ACCESS: CallerIdentity = { userId: 14 };
const ADMIN: CallerIdentity = { userId: 1 };

describe('TicketQueryService', () => {
  let db: TestDatabase;
  let logger: AppLogger;
  let service: TicketQueryService;

  beforeEach(async () => {
    db = await createTestDatabase();
    logger = createMockLogger();
    const accessResolver = new QueueAccessResolver({ knex: db.knex, adminUserIds: [1, 2], adminGroup: 'admin', logger });
    service = new TicketQueryService({ knex: db.knex, accessResolver, logger, now: () => NOW });

    await db.createGroup(100, 'alpha');
    await db.createGroup(200, 'beta');
    await db.createGroup(300, 'both');
    await db.createQueue(1, 'Alpha', 100);
    await db.createQueue(2, 'Beta', 200);
    await db.createQueue(3, 'Both', 300);
    await db.createQueue(4, 'Archive', 100, 2);
    await db.createQueue(5, 'Empty', 100);

    await db.grant(10, 100, 'rw');
    await db.grant(10, 300, 'rw');
    await db.grant(11, 200, 'rw');
    await db.grant(11, 300, 'rw');

    await db.createTicket({ id: 1, queueId: 1, stateId: 4, createTime: '2024-03-08T00:00:00.000Z' });
    await db.createTicket({ id: 2, queueId: 1, stateId: 1, priorityId: 5, createTime: '2024-03-10T10:00:00.000Z' });
    await db.createTicket({ id: 3, queueId: 2, stateId: 4, createTime: '2024-03-09T00:00:00.000Z' });
    await db.createTicket({
      id: 4,
      queueId: 3,
      stateId: 6,
      untilTime: nowEpoch - 3600,
      createTime: '2024-03-09T06:00:00.000Z',
    });
    await db.createTicket({ id: 5, queueId: 3, stateId: 2, createTime: '2024-03-01T00:00:00.000Z' });
    await db.createTicket({
      id: 6,
      queueId: 2,
      stateId: 7,
      untilTime: nowEpoch + 1800,
      createTime: '2024-03-10T11:00:00.000Z',
    });
    await db.createTicket({
      id: 7,
      queueId: 1,
      stateId: 6,
      untilTime: nowEpoch + 3600,
      createTime: '2024-03-10T09:00:00.000Z',
    });
  });

  afterEach(async () => {
    await db.cleanup();
  });

  describe('listTickets', () => {
    it('returns only tickets in accessible queues', async () => {
      const result = await service.listTickets(ALPHA_AGENT);

      expect(result.total).toBe(5);
      expect(result.tickets.map((view) => view.ticket.id)).toEqual([7, 5, 4, 2, 1]);
    });

    it('refuses an explicitly named inaccessible queue', async () => {
      await expect(service.listTickets(ALPHA_AGENT, { queueId: 2 })).rejects.toMatchObject({
        status: 403,
        message: 'You do not have permission to access this queue',
      });
    });

    it('narrows to an accessible queue', async () => {
      const result = await service.listTickets(ALPHA_AGENT, { queueId: 3 });
      expect(result.tickets.map((view) => view.ticket.id)).toEqual([5, 4]);
    });

    it('filters by state type and attaches pending metadata', async () => {
      const result = await service.listTickets(ALPHA_AGENT, { stateType: 'pending' });

      expect(result.tickets.map((view) => view.ticket.id)).toEqual([7, 4]);
      const overdue = result.tickets[1];
      expect(overdue?.stateName).toBe('pending reminder');
      expect(overdue?.stateType).toBe('pending reminder');
      expect(overdue?.reminder).toMatchObject({ pending: true, hasTime: true, overdue: true, relative: '1h' });
      expect(overdue?.autoClose).toMatchObject({ pending: false, overdue: true });
    });

    it('paginates', async () => {
      const result = await service.listTickets(ALPHA_AGENT, { page: 2, perPage: 2 });

      expect(result).toMatchObject({ total: 5, page: 2, perPage: 2 });
      expect(result.tickets.map((view) => view.ticket.id)).toEqual([4, 2]);
    });

    it('returns nothing for callers without queues', async () => {
      expect(await service.listTickets(NO_ACCESS)).toEqual({ tickets: [], total: 0, page: 1, perPage: 25 });
    });

    it('uses a precomputed queue list when supplied', async () => {
      const caller: CallerIdentity = { userId: 14, accessibleQueues: { capability: 'ro', queueIds: [2] } };
      const result = await service.listTickets(caller);
      expect(result.tickets.map((view) => view.ticket.id)).toEqual([6, 3]);
    });

    it('lets admins see every queue', async () => {
      expect((await service.listTickets(ADMIN)).total).toBe(7);
    });
  });

  describe('getTicket', () => {
    it('returns the joined view', async () => {
      const view = await service.getTicket(ALPHA_AGENT, 1);

      expect(view).toMatchObject({
        ticket: { id: 1, queue_id: 1 },
        stateName: 'open',
        stateType: 'open',
        queueName: 'Alpha',
        priorityName: '3 normal',
        autoClose: { pending: false },
      });
    });

    it('finds tickets by number', async () => {
      const view = await service.getTicket(ALPHA_AGENT, '20240101000002');
      expect(view.ticket.id).toBe(2);
    });

    it('refuses tickets in inaccessible queues', async () => {
      await expect(service.getTicket(ALPHA_AGENT, 3)).rejects.toMatchObject({ status: 403 });
    });

    it('returns 404 for unknown tickets', async () => {
      await expect(service.getTicket(ALPHA_AGENT, 999)).rejects.toMatchObject({
        status: 404,
        message: 'Ticket not found',
      });
    });
  });

  describe('getTicketHistory', () => {
    it('returns entries in insertion order', async () => {
      const base = {
        ticket_id: 1,
        queue_id: 1,
        owner_id: 1,
        priority_id: 3,
        state_id: 4,
        create_time: '2024-03-10T12:00:00.000Z',
        create_by: 10,
      };
      await db.knex('ticket_history').insert({ ...base, history_type: 'StateUpdate', name: 'State changed from new to open' });
      await db.knex('ticket_history').insert({ ...base, history_type: 'AddNote', name: 'Internal note' });

      const entries = await service.getTicketHistory(ALPHA_AGENT, 1);
      expect(entries.map((entry) => entry.name)).toEqual(['State changed from new to open', 'Internal note']);
    });

    it('refuses tickets in inaccessible queues', async () => {
      await expect(service.getTicketHistory(ALPHA_AGENT, 3)).rejects.toMatchObject({ status: 403 });
    });
  });

  describe('dashboardStats', () => {
    it('aggregates only accessible tickets', async () => {
      const stats = await service.dashboardStats(ALPHA_AGENT);

      expect(stats.overview).toEqual({ total: 5, new: 1, open: 1, pending: 2, closed: 1 });
      expect(stats.byQueue).toEqual([
        { queueId: 1, queueName: 'Alpha', count: 3 },
        { queueId: 3, queueName: 'Both', count: 2 },
      ]);
      expect(stats.byPriority).toEqual([
        { priorityId: 3, priorityName: '3 normal', count: 4 },
        { priorityId: 5, priorityName: '5 very high', count: 1 },
      ]);
      expect(stats.recent.map((ticket) => ticket.id)).toEqual([2, 7, 4, 1, 5]);
    });

    it('never counts tickets from queues outside the scope', async () => {
      const stats = await service.dashboardStats(BETA_AGENT);

      expect(stats.overview.total).toBe(4);
      expect(stats.byQueue.map((row) => row.queueName)).toEqual(['Beta', 'Both']);
    });

    it('refuses an explicitly named inaccessible queue', async () => {
      await expect(service.dashboardStats(ALPHA_AGENT, { queueId: 2 })).rejects.toMatchObject({ status: 403 });
    });

    it('degrades failed aggregates to empty results', async () => {
      await db.knex.schema.renameTable('ticket_priority', 'ticket_priority_retired');

      const stats = await service.dashboardStats(ALPHA_AGENT);

      expect(stats.overview.total).toBe(5);
      expect(stats.byQueue).toHaveLength(2);
      expect(stats.byPriority).toEqual([]);
      expect(stats.recent).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith(
        '[TicketQuery] aggregate query failed, returning empty result',
        expect.objectContaining({ aggregate: 'tickets by priority' }),
      );
    });
  });

  describe('queueStatistics', () => {
    it('reports per-queue counts sorted by total then name', async () => {
      expect(await service.queueStatistics(ALPHA_AGENT)).toEqual([
        { queueId: 1, queueName: 'Alpha', total: 3, open: 2, pending: 1, backlog: 1 },
        { queueId: 3, queueName: 'Both', total: 2, open: 0, pending: 1, backlog: 0 },
        { queueId: 5, queueName: 'Empty', total: 0, open: 0, pending: 0, backlog: 0 },
      ]);
    });

    it('covers every valid queue for admins', async () => {
      const stats = await service.queueStatistics(ADMIN);

      expect(stats.map((row) => row.queueName)).toEqual(['Alpha', 'Beta', 'Both', 'Empty']);
      expect(stats[1]).toEqual({ queueId: 2, queueName: 'Beta', total: 2, open: 1, pending: 1, backlog: 1 });
    });

    it('refuses an explicitly named inaccessible queue', async () => {
      await expect(service.queueStatistics(ALPHA_AGENT, { queueId: 2 })).rejects.toMatchObject({ status: 403 });
    });
  });

  describe('states pending only by name', () => {
    beforeEach(async () => {
      await db.knex('ticket_state').insert({ id: 10, name: 'Pending-Reminder (legacy)', type_id: 2, valid_id: 1 });
      await db.createTicket({ id: 8, queueId: 1, stateId: 10, untilTime: nowEpoch - 60 });
    });

    it('lists them under the pending filter only', async () => {
      const pending = await service.listTickets(ALPHA_AGENT, { stateType: 'pending' });
      const open = await service.listTickets(ALPHA_AGENT, { stateType: 'open' });

      expect(pending.tickets.map((view) => view.ticket.id)).toEqual([8, 7, 4]);
      expect(open.tickets.map((view) => view.ticket.id)).toEqual([1]);
    });

    it('counts them as pending in the dashboard and queue statistics', async () => {
      const stats = await service.dashboardStats(ALPHA_AGENT);
      expect(stats.overview).toEqual({ total: 6, new: 1, open: 1, pending: 3, closed: 1 });

      const queues = await service.queueStatistics(ALPHA_AGENT);
      expect(queues[0]).toEqual({ queueId: 1, queueName: 'Alpha', total: 4, open: 2, pending: 2, backlog: 1 });
    });
  });

  describe('pendingReminderFeed', () => {
    it('lists due reminders in accessible queues', async () => {
      const feed = await service.pendingReminderFeed(ALPHA_AGENT);

      expect(feed).toHaveLength(1);
      expect(feed[0]).toMatchObject({
        ticketId: 4,
        queueName: 'Both',
        untilTime: nowEpoch - 3600,
        reminder: { pending: true, hasTime: true, overdue: true, relative: '1h', at: '2024-03-10 11:00:00 UTC' },
      });
    });

    it('includes legacy states recognised by name', async () => {
      await db.knex('ticket_state').insert({ id: 10, name: 'Pending-Reminder (legacy)', type_id: 2, valid_id: 1 });
      await db.createTicket({ id: 8, queueId: 1, stateId: 10, untilTime: nowEpoch - 60 });

      const feed = await service.pendingReminderFeed(ALPHA_AGENT);
      expect(feed.map((item) => item.ticketId)).toEqual([4, 8]);
    });

    it('returns nothing for callers without queues', async () => {
      expect(await service.pendingReminderFeed(NO_ACCESS)).toEqual([]);
    });
  });
});
