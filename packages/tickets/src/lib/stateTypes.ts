import type { TicketStateTypeFilter } from '@deskflow/types';

export const STATE_TYPE = {
  new: 1,
  open: 2,
  closed: 3,
  pendingReminder: 4,
  pendingAuto: 5,
  removed: 6,
  merged: 7,
} as const;

export type StateTypeName = 'new' | 'open' | 'closed' | 'pending reminder' | 'pending auto' | 'removed' | 'merged';

const STATE_TYPE_NAMES: Record<number, StateTypeName> = {
  [STATE_TYPE.new]: 'new',
  [STATE_TYPE.open]: 'open',
  [STATE_TYPE.closed]: 'closed',
  [STATE_TYPE.pendingReminder]: 'pending reminder',
  [STATE_TYPE.pendingAuto]: 'pending auto',
  [STATE_TYPE.removed]: 'removed',
  [STATE_TYPE.merged]: 'merged',
};

export function classifyStateType(typeId: number): StateTypeName | 'unknown' {
  return STATE_TYPE_NAMES[typeId] ?? 'unknown';
}

function normalizeStateName(name: string): string {
  return name.toLowerCase().replace(/-/g, ' ');
}

// Type id is authoritative; the name check covers migrated rows whose type id was never set.
export function isPendingAutoState(stateName: string, stateTypeId: number): boolean {
  return stateTypeId === STATE_TYPE.pendingAuto || normalizeStateName(stateName).includes('pending auto');
}

export function isPendingReminderState(stateName: string, stateTypeId: number): boolean {
  return stateTypeId === STATE_TYPE.pendingReminder || normalizeStateName(stateName).includes('pending reminder');
}

export function isPendingState(stateName: string, stateTypeId: number): boolean {
  return isPendingAutoState(stateName, stateTypeId) || isPendingReminderState(stateName, stateTypeId);
}

/**
 * State type ids matched by a list filter. Pending covers both reminder and auto-close.
 */
export function stateTypeIdsForFilter(filter: TicketStateTypeFilter): number[] {
  switch (filter) {
    case 'new':
      return [STATE_TYPE.new];
    case 'open':
      return [STATE_TYPE.open];
    case 'pending':
      return [STATE_TYPE.pendingReminder, STATE_TYPE.pendingAuto];
    case 'closed':
      return [STATE_TYPE.closed];
  }
}
