/**
 * Row shapes for the ticket tables.
 *
 * Times stored by the application (`create_time`, `change_time`) are ISO-8601 strings.
 * `until_time` is epoch seconds; 0 means no pending deadline was stored.
 */
export interface ITicket {
  id: number;
  tn: string;
  title: string;
  queue_id: number;
  ticket_state_id: number;
  ticket_priority_id: number;
  /** Owner (assigned agent). */
  user_id: number;
  responsible_user_id: number | null;
  customer_id: string | null;
  customer_user_id: string | null;
  until_time: number;
  create_time: string;
  create_by: number;
  change_time: string;
  change_by: number;
}

export interface ITicketState {
  id: number;
  name: string;
  type_id: number;
  valid_id: number;
}

export interface ITicketStateType {
  id: number;
  name: string;
}

export interface ITicketPriority {
  id: number;
  name: string;
  valid_id: number;
}

export interface IQueue {
  id: number;
  name: string;
  group_id: number;
  valid_id: number;
}

export interface IArticle {
  id: number;
  ticket_id: number;
  body: string;
  is_visible_for_customer: number;
  create_time: string;
  create_by: number;
}

/**
 * Fields the transition engine is allowed to write in a single update.
 */
export type TicketMutableFields = Partial<
  Pick<
    ITicket,
    'ticket_state_id' | 'ticket_priority_id' | 'queue_id' | 'user_id' | 'responsible_user_id' | 'until_time'
  >
>;

export type TicketStateTypeFilter = 'new' | 'open' | 'pending' | 'closed';

export interface ITicketListFilters {
  queueId?: number;
  stateType?: TicketStateTypeFilter;
  page?: number;
  perPage?: number;
}
