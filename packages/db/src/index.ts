/**
 * @deskflow/db
 *
 * Knex connection factory and the helpdesk relational schema.
 */

export { getKnexConfig } from './lib/knexfile';
export type { HelpdeskKnexConfig } from './lib/knexfile';
export { createDbConnection, destroyDbConnection, toCount } from './lib/connection';
export {
  createHelpdeskSchema,
  seedTicketStates,
  seedTicketPriorities,
  STANDARD_STATES,
  STANDARD_STATE_TYPES,
  STANDARD_PRIORITIES,
} from './schema/helpdeskSchema';
