import type { Knex } from 'knex';
import type { ITicketHistoryEntry } from '@deskflow/types';

export type NewTicketHistoryEntry = Omit<ITicketHistoryEntry, 'id'>;

const TicketHistory = {
  insert: async (knexOrTrx: Knex | Knex.Transaction, entry: NewTicketHistoryEntry): Promise<void> => {
    await knexOrTrx('ticket_history').insert(entry);
  },

  listForTicket: async (knexOrTrx: Knex | Knex.Transaction, ticketId: number): Promise<ITicketHistoryEntry[]> => {
    return knexOrTrx<ITicketHistoryEntry>('ticket_history')
      .select('*')
      .where({ ticket_id: ticketId })
      .orderBy('id', 'asc');
  },
};

export default TicketHistory;
