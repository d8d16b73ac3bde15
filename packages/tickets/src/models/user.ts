import type { Knex } from 'knex';
import type { IUser } from '@deskflow/types';

const User = {
  getValid: async (knexOrTrx: Knex | Knex.Transaction, id: number): Promise<IUser | undefined> => {
    return knexOrTrx<IUser>('users')
      .select('id', 'login', 'first_name', 'last_name', 'valid_id')
      .where({ id, valid_id: 1 })
      .first();
  },

  getLogin: async (knexOrTrx: Knex | Knex.Transaction, id: number): Promise<string | undefined> => {
    const row = await knexOrTrx<IUser>('users').select('login').where({ id }).first();
    return row?.login;
  },
};

export default User;
