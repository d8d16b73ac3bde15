/**
 * Ticket state rows. Resolution and naming rules live in the state catalog.
 */

import type { Knex } from 'knex';
import type { ITicketState } from '@deskflow/types';

function normalizeState(row: ITicketState): ITicketState {
  return { ...row, id: Number(row.id), type_id: Number(row.type_id), valid_id: Number(row.valid_id) };
}

const TicketState = {
  getAllValid: async (knexOrTrx: Knex | Knex.Transaction): Promise<ITicketState[]> => {
    const rows = await knexOrTrx<ITicketState>('ticket_state')
      .select('id', 'name', 'type_id', 'valid_id')
      .where({ valid_id: 1 })
      .orderBy('id', 'asc');
    return rows.map(normalizeState);
  },

  get: async (knexOrTrx: Knex | Knex.Transaction, id: number): Promise<ITicketState | undefined> => {
    const row = await knexOrTrx<ITicketState>('ticket_state')
      .select('id', 'name', 'type_id', 'valid_id')
      .where({ id })
      .first();
    return row ? normalizeState(row) : undefined;
  },
};

export default TicketState;
