export type HistoryType =
  | 'NewTicket'
  | 'StateUpdate'
  | 'PriorityUpdate'
  | 'Move'
  | 'OwnerUpdate'
  | 'ResponsibleUpdate'
  | 'SetPendingTime'
  | 'AddNote';

export interface TicketSnapshot {
  ticket_state_id: number;
  ticket_priority_id: number;
  queue_id: number;
  user_id: number;
  responsible_user_id: number | null;
  until_time: number;
}

/**
 * Append-only audit row. The snapshot columns hold the ticket's values after the change;
 * `changed_data` holds the before/after pair as JSON when a prior snapshot was available.
 */
export interface ITicketHistoryEntry {
  id: number;
  ticket_id: number;
  article_id: number | null;
  history_type: HistoryType;
  name: string;
  queue_id: number;
  owner_id: number;
  priority_id: number;
  state_id: number;
  changed_data: string | null;
  create_time: string;
  create_by: number;
}
