/**
 * Data access layer for ticket entities.
 */

export { default as Ticket, normalizeTicket, snapshotOf } from './ticket';
export { default as TicketState } from './status';
export { default as Priority } from './priority';
export { default as Queue } from './queue';
export { default as User } from './user';
export { default as Article } from './article';
export { default as TicketHistory } from './ticketHistory';
