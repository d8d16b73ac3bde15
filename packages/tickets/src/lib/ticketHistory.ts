/**
 * History Recorder.
 *
 * Appends one immutable `ticket_history` row per semantic change. Rows carry the ticket's
 * values after the change plus, when a prior snapshot is known, the before/after pair.
 */

import type { Knex } from 'knex';
import type { HistoryType, ITicket, TicketSnapshot } from '@deskflow/types';
import { DependencyError, getErrorMessage } from '@deskflow/core/errors';
import defaultLogger, { type AppLogger } from '@deskflow/core/logger';
import TicketHistory from '../models/ticketHistory';
import { snapshotOf } from '../models/ticket';

export const SYSTEM_USER_ID = 1;

const MAX_MESSAGE_LENGTH = 400;

/**
 * `"<Field> changed from <old> to <new>"`, or `""` when nothing changed.
 */
export function changeMessage(field: string, oldValue: string, newValue: string): string {
  const before = oldValue.trim();
  const after = newValue.trim();
  if (before === after) {
    return '';
  }
  if (!before) {
    return `${field} set to ${after}`;
  }
  if (!after) {
    return `${field} cleared`;
  }
  return `${field} changed from ${before} to ${after}`;
}

/**
 * Collapses whitespace and cuts to `limit` characters, marking the cut with an ellipsis.
 */
export function excerpt(text: string, limit: number): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  const chars = Array.from(collapsed);
  if (chars.length <= limit) {
    return collapsed;
  }
  return `${chars.slice(0, limit).join('').trimEnd()}…`;
}

export interface HistoryRecordInput {
  before?: TicketSnapshot | null;
  after: ITicket;
  articleId?: number | null;
  historyType: HistoryType;
  message: string;
  actorId: number;
}

export interface HistoryRecorderOptions {
  knex: Knex | Knex.Transaction;
  logger?: AppLogger;
  now?: () => Date;
}

export class HistoryRecorder {
  private readonly knex: Knex | Knex.Transaction;
  private readonly logger: AppLogger;
  private readonly now: () => Date;

  constructor(options: HistoryRecorderOptions) {
    this.knex = options.knex;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Writes the entry. An empty message is a no-op and returns false.
   * Store failures are raised as DependencyError.
   */
  async record(input: HistoryRecordInput): Promise<boolean> {
    const message = input.message.trim();
    if (!message) {
      this.logger.debug('[TicketHistory] empty message, entry skipped', {
        ticketId: input.after.id,
        historyType: input.historyType,
        suppressed: true,
      });
      return false;
    }

    const after = input.after;
    const changedData = input.before ? JSON.stringify({ before: input.before, after: snapshotOf(after) }) : null;

    try {
      await TicketHistory.insert(this.knex, {
        ticket_id: after.id,
        article_id: input.articleId ?? null,
        history_type: input.historyType,
        name: Array.from(message).slice(0, MAX_MESSAGE_LENGTH).join(''),
        queue_id: after.queue_id,
        owner_id: after.user_id,
        priority_id: after.ticket_priority_id,
        state_id: after.ticket_state_id,
        changed_data: changedData,
        create_time: this.now().toISOString(),
        create_by: input.actorId > 0 ? input.actorId : SYSTEM_USER_ID,
      });
    } catch (error) {
      throw new DependencyError('Failed to write ticket history', error, {
        ticketId: after.id,
        historyType: input.historyType,
      });
    }

    this.logger.trace('[TicketHistory] entry recorded', { ticketId: after.id, historyType: input.historyType });
    return true;
  }

  /**
   * Best-effort write used after a committed ticket update: failures are logged, never raised.
   */
  async tryRecord(input: HistoryRecordInput): Promise<boolean> {
    try {
      return await this.record(input);
    } catch (error) {
      this.logger.warn('[TicketHistory] audit write failed after ticket update', {
        ticketId: input.after.id,
        historyType: input.historyType,
        actorId: input.actorId,
        auditWriteFailed: true,
        error: getErrorMessage(error instanceof DependencyError ? error.cause : error),
      });
      return false;
    }
  }
}
