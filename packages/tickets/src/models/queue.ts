import type { Knex } from 'knex';
import type { IQueue } from '@deskflow/types';

const Queue = {
  /**
   * Only valid queues are returned.
   */
  get: async (knexOrTrx: Knex | Knex.Transaction, id: number): Promise<IQueue | undefined> => {
    return knexOrTrx<IQueue>('queue')
      .select('id', 'name', 'group_id', 'valid_id')
      .where({ id, valid_id: 1 })
      .first();
  },

  getName: async (knexOrTrx: Knex | Knex.Transaction, id: number): Promise<string | undefined> => {
    const row = await knexOrTrx<IQueue>('queue').select('name').where({ id }).first();
    return row?.name;
  },
};

export default Queue;
