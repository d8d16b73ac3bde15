import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { AppLogger } from '@deskflow/core/logger';
import { DependencyError } from '@deskflow/core/errors';
import { createTestDatabase, type TestDatabase } from '@deskflow/db/test-utils';
import type { ITicket } from '@deskflow/types';
import { HistoryRecorder, changeMessage, excerpt } from './ticketHistory';
import { createMockLogger } from '../test-utils/logger';

describe('changeMessage', () => {
  it('suppresses unchanged values', () => {
    expect(changeMessage('Priority', '3 normal', '3 normal')).toBe('');
    expect(changeMessage('Priority', ' 3 normal', '3 normal ')).toBe('');
  });

  it('describes a change', () => {
    expect(changeMessage('Priority', '3 normal', '5 very high')).toBe('Priority changed from 3 normal to 5 very high');
  });

  it('describes values appearing or disappearing', () => {
    expect(changeMessage('Responsible', '', 'jdoe')).toBe('Responsible set to jdoe');
    expect(changeMessage('Responsible', 'jdoe', '')).toBe('Responsible cleared');
  });
});

describe('excerpt', () => {
  it('collapses whitespace', () => {
    expect(excerpt('  Printer\n\n  is   jammed ', 140)).toBe('Printer is jammed');
  });

  it('cuts long text with an ellipsis', () => {
    expect(excerpt('abcdef ghij', 7)).toBe('abcdef…');
  });
});

describe('HistoryRecorder', () => {
  let db: TestDatabase;
  let logger: AppLogger;
  let recorder: HistoryRecorder;
  let ticket: ITicket;
  const fixedNow = new Date('2024-05-01T08:00:00.000Z');

  beforeEach(async () => {
    db = await createTestDatabase();
    logger = createMockLogger();
    recorder = new HistoryRecorder({ knex: db.knex, logger, now: () => fixedNow });
    await db.createGroup(10, 'support');
    await db.createQueue(100, 'Support', 10);
    await db.createTicket({ id: 1, queueId: 100, ownerId: 5 });
    const loaded = await db.getTicket(1);
    if (!loaded) throw new Error('fixture ticket missing');
    ticket = loaded;
  });

  afterEach(async () => {
    await db.cleanup();
  });

  it('appends an attributed entry with the post-change snapshot', async () => {
    const before = {
      ticket_state_id: 1,
      ticket_priority_id: 3,
      queue_id: 100,
      user_id: 5,
      responsible_user_id: null,
      until_time: 0,
    };

    const written = await recorder.record({
      before,
      after: ticket,
      historyType: 'StateUpdate',
      message: 'State changed from new to open',
      actorId: 7,
    });

    expect(written).toBe(true);
    const rows = await db.knex('ticket_history').select('*');
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      ticket_id: 1,
      article_id: null,
      history_type: 'StateUpdate',
      name: 'State changed from new to open',
      queue_id: 100,
      owner_id: 5,
      priority_id: 3,
      state_id: 4,
      create_time: '2024-05-01T08:00:00.000Z',
      create_by: 7,
    });
    expect(JSON.parse(rows[0].changed_data)).toEqual({
      before,
      after: { ...before, ticket_state_id: 4 },
    });
  });

  it('skips empty messages as a logged no-op', async () => {
    const written = await recorder.record({ after: ticket, historyType: 'PriorityUpdate', message: '  ', actorId: 7 });

    expect(written).toBe(false);
    expect(await db.knex('ticket_history').count({ count: '*' }).first()).toEqual({ count: 0 });
    expect(logger.debug).toHaveBeenCalledWith('[TicketHistory] empty message, entry skipped', {
      ticketId: 1,
      historyType: 'PriorityUpdate',
      suppressed: true,
    });
  });

  it('attributes system changes when no actor is known', async () => {
    await recorder.record({ after: ticket, historyType: 'Move', message: 'Queue changed from A to B', actorId: 0 });
    const row = await db.knex('ticket_history').first('create_by');
    expect(row).toEqual({ create_by: 1 });
  });

  it('raises store failures from record and only logs them from tryRecord', async () => {
    await db.knex.schema.dropTable('ticket_history');

    await expect(
      recorder.record({ after: ticket, historyType: 'AddNote', message: 'Internal note', actorId: 7 }),
    ).rejects.toBeInstanceOf(DependencyError);

    const written = await recorder.tryRecord({
      after: ticket,
      historyType: 'AddNote',
      message: 'Internal note',
      actorId: 7,
    });
    expect(written).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      '[TicketHistory] audit write failed after ticket update',
      expect.objectContaining({ ticketId: 1, historyType: 'AddNote', auditWriteFailed: true }),
    );
  });
});
