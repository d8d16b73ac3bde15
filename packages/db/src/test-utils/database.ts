import knex, { type Knex } from 'knex';
import type { ITicket, PermissionKey } from '@deskflow/types';
import { createHelpdeskSchema, seedTicketPriorities, seedTicketStates } from '../schema/helpdeskSchema';

export interface TestTicketInput {
  id: number;
  queueId: number;
  title?: string;
  tn?: string;
  stateId?: number;
  priorityId?: number;
  ownerId?: number;
  responsibleUserId?: number | null;
  customerId?: string | null;
  customerUserId?: string | null;
  untilTime?: number;
  createTime?: string;
}

export interface TestDatabase {
  knex: Knex;
  createUser: (id: number, login: string) => Promise<void>;
  createGroup: (id: number, name: string, validId?: number) => Promise<void>;
  createQueue: (id: number, name: string, groupId: number, validId?: number) => Promise<void>;
  grant: (userId: number, groupId: number, key: PermissionKey | string, value?: number) => Promise<void>;
  grantCustomer: (customerId: string, groupId: number, key: PermissionKey | string) => Promise<void>;
  grantCustomerUser: (login: string, groupId: number, key: PermissionKey | string) => Promise<void>;
  createTicket: (input: TestTicketInput) => Promise<void>;
  getTicket: (id: number) => Promise<ITicket | undefined>;
  cleanup: () => Promise<void>;
}

export const TEST_CREATE_TIME = '2024-01-01T00:00:00.000Z';

/**
 * In-memory better-sqlite3 database carrying the full helpdesk schema, standard states and priorities.
 */
export async function createTestDatabase(): Promise<TestDatabase> {
  const db = knex({
    client: 'better-sqlite3',
    connection: { filename: ':memory:' },
    useNullAsDefault: true,
  });

  await createHelpdeskSchema(db);
  await seedTicketStates(db);
  await seedTicketPriorities(db);

  return {
    knex: db,
    createUser: async (id, login) => {
      await db('users').insert({ id, login, first_name: login, last_name: 'Agent', valid_id: 1 });
    },
    createGroup: async (id, name, validId = 1) => {
      await db('permission_groups').insert({ id, name, valid_id: validId });
    },
    createQueue: async (id, name, groupId, validId = 1) => {
      await db('queue').insert({ id, name, group_id: groupId, valid_id: validId });
    },
    grant: async (userId, groupId, key, value = 1) => {
      await db('group_user').insert({
        user_id: userId,
        group_id: groupId,
        permission_key: key,
        permission_value: value,
      });
    },
    grantCustomer: async (customerId, groupId, key) => {
      await db('group_customer').insert({
        customer_id: customerId,
        group_id: groupId,
        permission_key: key,
        permission_value: 1,
      });
    },
    grantCustomerUser: async (login, groupId, key) => {
      await db('group_customer_user').insert({
        user_id: login,
        group_id: groupId,
        permission_key: key,
        permission_value: 1,
      });
    },
    createTicket: async (input) => {
      const createTime = input.createTime ?? TEST_CREATE_TIME;
      await db('ticket').insert({
        id: input.id,
        tn: input.tn ?? `2024010100${String(input.id).padStart(4, '0')}`,
        title: input.title ?? `Ticket ${input.id}`,
        queue_id: input.queueId,
        ticket_state_id: input.stateId ?? 4,
        ticket_priority_id: input.priorityId ?? 3,
        user_id: input.ownerId ?? 1,
        responsible_user_id: input.responsibleUserId ?? null,
        customer_id: input.customerId ?? null,
        customer_user_id: input.customerUserId ?? null,
        until_time: input.untilTime ?? 0,
        create_time: createTime,
        create_by: 1,
        change_time: createTime,
        change_by: 1,
      });
    },
    getTicket: async (id) => {
      const row: ITicket | undefined = await db<ITicket>('ticket').where({ id }).first();
      return row;
    },
    cleanup: async () => {
      await db.destroy();
    },
  };
}
