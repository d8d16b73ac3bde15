import type { Knex } from 'knex';
import type { ITicketStateType } from '@deskflow/types';

/**
 * Creates the helpdesk tables. Used by the in-memory test database and by fresh installs.
 */
export async function createHelpdeskSchema(knex: Knex): Promise<void> {
  await knex.schema.createTable('users', (table) => {
    table.integer('id').primary();
    table.string('login', 200).notNullable().unique();
    table.string('first_name', 100).notNullable().defaultTo('');
    table.string('last_name', 100).notNullable().defaultTo('');
    table.integer('valid_id').notNullable().defaultTo(1);
  });

  await knex.schema.createTable('permission_groups', (table) => {
    table.integer('id').primary();
    table.string('name', 200).notNullable().unique();
    table.integer('valid_id').notNullable().defaultTo(1);
  });

  await knex.schema.createTable('group_user', (table) => {
    table.integer('user_id').notNullable();
    table.integer('group_id').notNullable().references('id').inTable('permission_groups');
    table.string('permission_key', 20).notNullable();
    table.integer('permission_value').notNullable().defaultTo(1);
    table.primary(['user_id', 'group_id', 'permission_key']);
  });

  await knex.schema.createTable('group_customer', (table) => {
    table.string('customer_id', 150).notNullable();
    table.integer('group_id').notNullable().references('id').inTable('permission_groups');
    table.string('permission_key', 20).notNullable();
    table.integer('permission_value').notNullable().defaultTo(1);
    table.primary(['customer_id', 'group_id', 'permission_key']);
  });

  await knex.schema.createTable('group_customer_user', (table) => {
    table.string('user_id', 200).notNullable();
    table.integer('group_id').notNullable().references('id').inTable('permission_groups');
    table.string('permission_key', 20).notNullable();
    table.integer('permission_value').notNullable().defaultTo(1);
    table.primary(['user_id', 'group_id', 'permission_key']);
  });

  await knex.schema.createTable('queue', (table) => {
    table.integer('id').primary();
    table.string('name', 200).notNullable().unique();
    table.integer('group_id').notNullable().references('id').inTable('permission_groups');
    table.integer('valid_id').notNullable().defaultTo(1);
  });

  await knex.schema.createTable('ticket_state_type', (table) => {
    table.integer('id').primary();
    table.string('name', 200).notNullable().unique();
  });

  await knex.schema.createTable('ticket_state', (table) => {
    table.integer('id').primary();
    table.string('name', 200).notNullable().unique();
    table.integer('type_id').notNullable().references('id').inTable('ticket_state_type');
    table.integer('valid_id').notNullable().defaultTo(1);
  });

  await knex.schema.createTable('ticket_priority', (table) => {
    table.integer('id').primary();
    table.string('name', 200).notNullable().unique();
    table.integer('valid_id').notNullable().defaultTo(1);
  });

  await knex.schema.createTable('ticket', (table) => {
    table.integer('id').primary();
    table.string('tn', 50).notNullable().unique();
    table.string('title', 255).notNullable();
    table.integer('queue_id').notNullable().references('id').inTable('queue');
    table.integer('ticket_state_id').notNullable().references('id').inTable('ticket_state');
    table.integer('ticket_priority_id').notNullable().references('id').inTable('ticket_priority');
    table.integer('user_id').notNullable();
    table.integer('responsible_user_id').nullable();
    table.string('customer_id', 150).nullable();
    table.string('customer_user_id', 250).nullable();
    table.bigInteger('until_time').notNullable().defaultTo(0);
    table.string('create_time', 40).notNullable();
    table.integer('create_by').notNullable();
    table.string('change_time', 40).notNullable();
    table.integer('change_by').notNullable();
    table.index(['queue_id']);
    table.index(['ticket_state_id']);
  });

  await knex.schema.createTable('article', (table) => {
    table.increments('id').primary();
    table.integer('ticket_id').notNullable().references('id').inTable('ticket');
    table.text('body').notNullable();
    table.integer('is_visible_for_customer').notNullable().defaultTo(0);
    table.string('create_time', 40).notNullable();
    table.integer('create_by').notNullable();
  });

  await knex.schema.createTable('ticket_history', (table) => {
    table.increments('id').primary();
    table.integer('ticket_id').notNullable().references('id').inTable('ticket');
    table.integer('article_id').nullable();
    table.string('history_type', 40).notNullable();
    table.string('name', 400).notNullable();
    table.integer('queue_id').notNullable();
    table.integer('owner_id').notNullable();
    table.integer('priority_id').notNullable();
    table.integer('state_id').notNullable();
    table.text('changed_data').nullable();
    table.string('create_time', 40).notNullable();
    table.integer('create_by').notNullable();
    table.index(['ticket_id']);
  });
}

export const STANDARD_STATE_TYPES = [
  { id: 1, name: 'new' },
  { id: 2, name: 'open' },
  { id: 3, name: 'closed' },
  { id: 4, name: 'pending reminder' },
  { id: 5, name: 'pending auto' },
  { id: 6, name: 'removed' },
  { id: 7, name: 'merged' },
] as const satisfies readonly ITicketStateType[];

export const STANDARD_STATES = [
  { id: 1, name: 'new', type_id: 1, valid_id: 1 },
  { id: 2, name: 'closed successful', type_id: 3, valid_id: 1 },
  { id: 3, name: 'closed unsuccessful', type_id: 3, valid_id: 1 },
  { id: 4, name: 'open', type_id: 2, valid_id: 1 },
  { id: 5, name: 'removed', type_id: 6, valid_id: 1 },
  { id: 6, name: 'pending reminder', type_id: 4, valid_id: 1 },
  { id: 7, name: 'pending auto close+', type_id: 5, valid_id: 1 },
  { id: 8, name: 'pending auto close-', type_id: 5, valid_id: 1 },
  { id: 9, name: 'merged', type_id: 7, valid_id: 1 },
] as const;

export const STANDARD_PRIORITIES = [
  { id: 1, name: '1 very low', valid_id: 1 },
  { id: 2, name: '2 low', valid_id: 1 },
  { id: 3, name: '3 normal', valid_id: 1 },
  { id: 4, name: '4 high', valid_id: 1 },
  { id: 5, name: '5 very high', valid_id: 1 },
] as const;

export async function seedTicketStates(knex: Knex): Promise<void> {
  await knex('ticket_state_type').insert(STANDARD_STATE_TYPES.map((row) => ({ ...row })));
  await knex('ticket_state').insert(STANDARD_STATES.map((row) => ({ ...row })));
}

export async function seedTicketPriorities(knex: Knex): Promise<void> {
  await knex('ticket_priority').insert(STANDARD_PRIORITIES.map((row) => ({ ...row })));
}
