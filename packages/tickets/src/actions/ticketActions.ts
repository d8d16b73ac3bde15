/**
 * Caller-facing ticket actions.
 *
 * Every action takes the raw caller identity and raw input from the boundary, validates both, and
 * reports the outcome as an {@link ActionResult} instead of throwing.
 *
 * ```typescript
 * const actions = createTicketActions(createTicketServices({ knex }));
 * const result = await actions.updateTicketStatus(session.user, { ticketId: 42, status: 'closed successful' });
 * if (!result.success) reply(result.status, result.error);
 * ```
 */

import { z } from 'zod';
import type { CallerIdentity } from '@deskflow/types';
import { ValidationError, toAppError } from '@deskflow/core/errors';
import defaultLogger, { type AppLogger } from '@deskflow/core/logger';
import { createCallerIdentity } from '@deskflow/auth';
import type { OperationOptions, TicketTransitionService } from '../services/TicketTransitionService';
import type { TicketQueryService } from '../services/TicketQueryService';

export type ActionResult<T> =
  | { success: true; data: T }
  | { success: false; status: number; code: string; error: string };

export type TicketAction<In, T> = (
  rawCaller: unknown,
  input: In,
  options?: OperationOptions
) => Promise<ActionResult<T>>;

export interface TicketActionDeps {
  transitions: TicketTransitionService;
  queries: TicketQueryService;
  logger?: AppLogger;
}

const id = z.coerce.number().int().positive();
const optionalId = id.optional();
const pendingUntil = z.string().nullish();

const updateStatusSchema = z.object({ ticketId: id, status: z.string().default(''), pendingUntil });
const updatePrioritySchema = z.object({ ticketId: id, priorityId: z.coerce.number().int() });
const moveQueueSchema = z.object({ ticketId: id, queueId: z.coerce.number().int() });
const assignSchema = z.object({ ticketId: id, agentId: z.coerce.number().int() });

const addNoteSchema = z.object({
  ticketId: id,
  body: z.string(),
  visibleForCustomer: z.boolean().optional(),
  nextState: z.string().nullish(),
  pendingUntil,
});

const bulkUpdateSchema = z.object({
  ticketIds: z.array(z.coerce.number().int()),
  changes: z.object({
    status: z.string().optional(),
    pendingUntil,
    priorityId: z.coerce.number().int().optional(),
    queueId: z.coerce.number().int().optional(),
    ownerId: z.coerce.number().int().optional(),
    responsibleId: z.coerce.number().int().optional(),
  }),
});

const listTicketsSchema = z.object({
  queueId: optionalId,
  stateType: z.enum(['new', 'open', 'pending', 'closed']).optional(),
  page: z.coerce.number().int().positive().optional(),
  perPage: z.coerce.number().int().positive().optional(),
});

const getTicketSchema = z.object({
  ticket: z.union([id, z.string().trim().min(1)]),
});

const queueFilterSchema = z.object({ queueId: optionalId }).default({});
const emptySchema = z.object({}).default({});

export function createTicketActions(deps: TicketActionDeps) {
  const { transitions, queries } = deps;
  const logger = deps.logger ?? defaultLogger;

  function withCaller<In, Out, T>(
    action: string,
    schema: z.ZodType<Out, z.ZodTypeDef, In>,
    handler: (caller: CallerIdentity, input: Out, options: OperationOptions) => Promise<T>
  ): TicketAction<In, T> {
    return async (rawCaller, input, options = {}) => {
      try {
        const caller = createCallerIdentity(rawCaller);
        const parsed = schema.safeParse(input);
        if (!parsed.success) {
          const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
          throw new ValidationError(`Invalid input: ${issues.join('; ')}`, { issues });
        }
        return { success: true, data: await handler(caller, parsed.data, options) };
      } catch (error) {
        const appError = toAppError(error, `Failed to ${action}`);
        const meta = { action, status: appError.status, code: appError.code, error: appError.message };
        if (appError.status >= 500) {
          logger.error('[TicketActions] action failed', meta);
        } else {
          logger.warn('[TicketActions] action rejected', meta);
        }
        return { success: false, status: appError.status, code: appError.code, error: appError.message };
      }
    };
  }

  return {
    updateTicketStatus: withCaller('update ticket status', updateStatusSchema, (caller, input, options) =>
      transitions.updateState(caller, input.ticketId, input, options)
    ),

    updateTicketPriority: withCaller('update ticket priority', updatePrioritySchema, (caller, input, options) =>
      transitions.updatePriority(caller, input.ticketId, input.priorityId, options)
    ),

    moveTicketQueue: withCaller('move ticket', moveQueueSchema, (caller, input, options) =>
      transitions.moveQueue(caller, input.ticketId, input.queueId, options)
    ),

    assignTicket: withCaller('assign ticket', assignSchema, (caller, input, options) =>
      transitions.assignOwner(caller, input.ticketId, input.agentId, options)
    ),

    assignTicketResponsible: withCaller('assign responsible agent', assignSchema, (caller, input, options) =>
      transitions.assignResponsible(caller, input.ticketId, input.agentId, options)
    ),

    addTicketNote: withCaller('add note', addNoteSchema, (caller, input, options) =>
      transitions.addNote(caller, input.ticketId, input, options)
    ),

    bulkUpdateTickets: withCaller('bulk update tickets', bulkUpdateSchema, (caller, input, options) =>
      transitions.bulkUpdate(caller, input.ticketIds, input.changes, options)
    ),

    listTickets: withCaller('list tickets', listTicketsSchema, (caller, input) => queries.listTickets(caller, input)),

    getTicket: withCaller('load ticket', getTicketSchema, (caller, input) => queries.getTicket(caller, input.ticket)),

    getTicketHistory: withCaller('load ticket history', z.object({ ticketId: id }), (caller, input) =>
      queries.getTicketHistory(caller, input.ticketId)
    ),

    getDashboardStats: withCaller('load dashboard', queueFilterSchema, (caller, input) =>
      queries.dashboardStats(caller, input)
    ),

    getQueueStatistics: withCaller('load queue statistics', queueFilterSchema, (caller, input) =>
      queries.queueStatistics(caller, input)
    ),

    getPendingReminders: withCaller('load pending reminders', emptySchema, (caller) =>
      queries.pendingReminderFeed(caller)
    ),
  };
}

export type TicketActions = ReturnType<typeof createTicketActions>;
