import type { Knex } from 'knex';
import type { ITicketPriority } from '@deskflow/types';

const Priority = {
  /**
   * Only valid priorities are returned.
   */
  get: async (knexOrTrx: Knex | Knex.Transaction, id: number): Promise<ITicketPriority | undefined> => {
    return knexOrTrx<ITicketPriority>('ticket_priority')
      .select('id', 'name', 'valid_id')
      .where({ id, valid_id: 1 })
      .first();
  },

  getName: async (knexOrTrx: Knex | Knex.Transaction, id: number): Promise<string | undefined> => {
    const row = await knexOrTrx<ITicketPriority>('ticket_priority').select('name').where({ id }).first();
    return row?.name;
  },
};

export default Priority;
