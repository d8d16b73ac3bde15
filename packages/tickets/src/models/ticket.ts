/**
 * Ticket Model
 *
 * Reads and writes the `ticket` row. Writes go through {@link Ticket.update} only,
 * called by the transition service.
 */

import type { Knex } from 'knex';
import type { ITicket, TicketMutableFields, TicketSnapshot } from '@deskflow/types';

// pg returns bigint columns as strings.
export type TicketRow = Omit<ITicket, 'until_time'> & { until_time: number | string | null };

export function normalizeTicket(row: TicketRow): ITicket {
  return {
    ...row,
    id: Number(row.id),
    queue_id: Number(row.queue_id),
    ticket_state_id: Number(row.ticket_state_id),
    ticket_priority_id: Number(row.ticket_priority_id),
    user_id: Number(row.user_id),
    responsible_user_id: row.responsible_user_id == null ? null : Number(row.responsible_user_id),
    until_time: Number(row.until_time ?? 0),
  };
}

export function snapshotOf(ticket: ITicket): TicketSnapshot {
  return {
    ticket_state_id: ticket.ticket_state_id,
    ticket_priority_id: ticket.ticket_priority_id,
    queue_id: ticket.queue_id,
    user_id: ticket.user_id,
    responsible_user_id: ticket.responsible_user_id,
    until_time: ticket.until_time,
  };
}

const Ticket = {
  get: async (knexOrTrx: Knex | Knex.Transaction, id: number): Promise<ITicket | undefined> => {
    const row = await knexOrTrx<TicketRow>('ticket').where({ id }).first();
    return row ? normalizeTicket(row) : undefined;
  },

  getByNumber: async (knexOrTrx: Knex | Knex.Transaction, tn: string): Promise<ITicket | undefined> => {
    const row = await knexOrTrx<TicketRow>('ticket').where({ tn }).first();
    return row ? normalizeTicket(row) : undefined;
  },

  /**
   * Single-statement update of the given fields plus change attribution. Returns affected row count.
   */
  update: async (
    knexOrTrx: Knex | Knex.Transaction,
    id: number,
    fields: TicketMutableFields,
    actorId: number,
    changeTime: string
  ): Promise<number> => {
    return knexOrTrx('ticket')
      .where({ id })
      .update({ ...fields, change_by: actorId, change_time: changeTime });
  },
};

export default Ticket;
