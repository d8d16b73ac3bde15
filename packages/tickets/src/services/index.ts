import type { Knex } from 'knex';
import { loadConfig, type HelpdeskConfig } from '@deskflow/core/config';
import type { AppLogger } from '@deskflow/core/logger';
import { QueueAccessResolver } from '@deskflow/auth';
import { StateCatalog } from '../lib/stateCatalog';
import { HistoryRecorder } from '../lib/ticketHistory';
import { TicketTransitionService } from './TicketTransitionService';
import { TicketQueryService } from './TicketQueryService';

export { TicketTransitionService } from './TicketTransitionService';
export type {
  AddNoteInput,
  BulkChanges,
  BulkOutcome,
  OperationOptions,
  TicketTransitionServiceOptions,
  UpdateStateInput,
} from './TicketTransitionService';
export { TicketQueryService, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE, RECENT_TICKET_LIMIT } from './TicketQueryService';
export type {
  DashboardStats,
  PendingReminderItem,
  QueueStatistic,
  TicketListResult,
  TicketQueryServiceOptions,
  TicketView,
} from './TicketQueryService';

export interface TicketServices {
  accessResolver: QueueAccessResolver;
  stateCatalog: StateCatalog;
  historyRecorder: HistoryRecorder;
  transitions: TicketTransitionService;
  queries: TicketQueryService;
}

export interface TicketServicesOptions {
  knex: Knex;
  config?: HelpdeskConfig;
  logger?: AppLogger;
  now?: () => Date;
}

/**
 * Wires the ticket services against one connection, taking admin and time zone policy from config.
 */
export function createTicketServices(options: TicketServicesOptions): TicketServices {
  const { knex, logger, now } = options;
  const { helpdesk } = options.config ?? loadConfig();

  const accessResolver = new QueueAccessResolver({
    knex,
    adminUserIds: helpdesk.adminUserIds,
    adminGroup: helpdesk.adminGroup,
    logger,
  });
  const stateCatalog = new StateCatalog({ knex, logger });
  const historyRecorder = new HistoryRecorder({ knex, logger, now });

  return {
    accessResolver,
    stateCatalog,
    historyRecorder,
    transitions: new TicketTransitionService({
      knex,
      accessResolver,
      stateCatalog,
      historyRecorder,
      timeZone: helpdesk.timeZone,
      logger,
      now,
    }),
    queries: new TicketQueryService({ knex, accessResolver, logger, now }),
  };
}
