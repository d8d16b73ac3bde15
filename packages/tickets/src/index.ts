/**
 * @deskflow/tickets
 *
 * Ticket state transitions, pending-time handling, audit history and queue-scoped reads.
 *
 * Caller-facing entry points live under '@deskflow/tickets/actions'.
 */

// Models
export * from './models';

// Lib utilities
export * from './lib/stateTypes';
export * from './lib/pendingTime';
export * from './lib/stateCatalog';
export * from './lib/ticketHistory';
export * from './lib/queueScopeFilter';

// Services
export * from './services';

// Actions
export { createTicketActions } from './actions/ticketActions';
export type { ActionResult, TicketAction, TicketActionDeps, TicketActions } from './actions/ticketActions';
