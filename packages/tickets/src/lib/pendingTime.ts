/**
 * Pending-time calculations for auto-close and reminder states.
 *
 * `until_time` is stored as epoch seconds. Zero means no deadline was stored; every display
 * and overdue check then uses `now + 24h` through {@link effectivePendingTime}.
 */

import { isValid, parse, parseISO } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { isPendingAutoState, isPendingReminderState } from './stateTypes';

export const DEFAULT_PENDING_OFFSET_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_REMINDER_MESSAGE = 'Default reminder time (24h from now)';

const WALL_CLOCK_FORMATS = [
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm",
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd HH:mm',
];

const EXPLICIT_OFFSET = /(Z|[+-]\d{2}:?\d{2})$/i;

export interface AutoCloseMeta {
  pending: boolean;
  at?: string;
  atISO?: string;
  relative?: string;
  overdue?: boolean;
}

export interface ReminderMeta extends AutoCloseMeta {
  hasTime: boolean;
  message?: string;
}

// A stored value outside the Date range is treated like an unset one.
export function effectivePendingTime(untilTime: number, now: Date = new Date()): Date {
  if (untilTime > 0) {
    const stored = new Date(untilTime * 1000);
    if (isValid(stored)) {
      return stored;
    }
  }
  return new Date(now.getTime() + DEFAULT_PENDING_OFFSET_MS);
}

/**
 * Largest two units: hours and minutes, or minutes and seconds under an hour.
 */
export function humanizeDuration(ms: number): string {
  const totalSeconds = Math.round(Math.abs(ms) / 1000);
  if (totalSeconds === 0) {
    return '0s';
  }

  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  const parts: string[] = [];
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (seconds > 0 && hours === 0) parts.push(`${seconds}s`);
  return parts.join(' ');
}

export function formatUtcAt(date: Date): string {
  return formatInTimeZone(date, 'UTC', "yyyy-MM-dd HH:mm:ss 'UTC'");
}

export function formatUtcIso(date: Date): string {
  return formatInTimeZone(date, 'UTC', "yyyy-MM-dd'T'HH:mm:ssXXX");
}

/**
 * Parses a pending-until input into epoch seconds. Wall-clock inputs are read in `timeZone`.
 * Returns 0 when the value is empty or not understood.
 */
export function parsePendingUntil(raw: string | null | undefined, timeZone: string): number {
  const value = raw?.trim() ?? '';
  if (!value) {
    return 0;
  }

  if (/^\d+$/.test(value)) {
    const epoch = Number(value);
    return Number.isSafeInteger(epoch) && isValid(new Date(epoch * 1000)) ? epoch : 0;
  }

  const reference = new Date(0);
  const matchesWallClock = WALL_CLOCK_FORMATS.some((fmt) => isValid(parse(value, fmt, reference)));
  if (matchesWallClock) {
    return toEpochSeconds(fromZonedTime(value.replace(' ', 'T'), timeZone));
  }

  if (EXPLICIT_OFFSET.test(value)) {
    return toEpochSeconds(parseISO(value));
  }

  return 0;
}

function toEpochSeconds(instant: Date): number {
  return isValid(instant) ? Math.floor(instant.getTime() / 1000) : 0;
}

export function formatPendingUntil(untilTime: number, timeZone: string): string {
  return formatInTimeZone(new Date(untilTime * 1000), timeZone, 'dd MMM yyyy HH:mm');
}

function describeDeadline(untilTime: number, now: Date): Required<Omit<AutoCloseMeta, 'pending'>> {
  const at = effectivePendingTime(untilTime, now);
  const diff = at.getTime() - now.getTime();
  return {
    at: formatUtcAt(at),
    atISO: formatUtcIso(at),
    overdue: diff < 0,
    relative: humanizeDuration(diff),
  };
}

/**
 * Auto-close metadata. The deadline is described when the state is pending auto or a time is stored.
 */
export function computeAutoCloseMeta(
  ticket: { until_time: number } | null,
  stateName: string,
  stateTypeId: number,
  now: Date = new Date()
): AutoCloseMeta {
  const pending = isPendingAutoState(stateName, stateTypeId);
  if (!ticket || (!pending && ticket.until_time <= 0)) {
    return { pending };
  }
  return { pending, ...describeDeadline(ticket.until_time, now) };
}

export function computeReminderMeta(
  ticket: { until_time: number } | null,
  stateName: string,
  stateTypeId: number,
  now: Date = new Date()
): ReminderMeta {
  const pending = isPendingReminderState(stateName, stateTypeId);
  if (!ticket || (!pending && ticket.until_time <= 0)) {
    return { pending, hasTime: false };
  }

  const hasTime = ticket.until_time > 0;
  const meta: ReminderMeta = { pending, hasTime, ...describeDeadline(ticket.until_time, now) };
  if (!hasTime) {
    meta.message = DEFAULT_REMINDER_MESSAGE;
  }
  return meta;
}
