import { describe, expect, it } from 'vitest';
import {
  DEFAULT_REMINDER_MESSAGE,
  computeAutoCloseMeta,
  computeReminderMeta,
  effectivePendingTime,
  formatPendingUntil,
  humanizeDuration,
  parsePendingUntil,
} from './pendingTime';

const NOW = new Date('2024-03-10T12:00:00Z');
const nowEpoch = Math.floor(NOW.getTime() / 1000);

describe('effectivePendingTime', () => {
  it('uses the stored epoch when set', () => {
    expect(effectivePendingTime(nowEpoch + 60, NOW).toISOString()).toBe('2024-03-10T12:01:00.000Z');
  });

  it('defaults to 24h after the given now', () => {
    const later = new Date(NOW.getTime() + 5 * 60 * 1000);

    expect(effectivePendingTime(0, NOW).getTime() - NOW.getTime()).toBe(24 * 60 * 60 * 1000);
    expect(effectivePendingTime(0, later).getTime() - later.getTime()).toBe(24 * 60 * 60 * 1000);
    expect(effectivePendingTime(0, later).getTime()).not.toBe(effectivePendingTime(0, NOW).getTime());
  });

  it('treats a stored epoch outside the Date range as unset', () => {
    expect(effectivePendingTime(99_999_999_999_999, NOW).toISOString()).toBe('2024-03-11T12:00:00.000Z');
  });
});

describe('humanizeDuration', () => {
  it('renders the two largest units', () => {
    expect(humanizeDuration(0)).toBe('0s');
    expect(humanizeDuration(45_000)).toBe('45s');
    expect(humanizeDuration(90_000)).toBe('1m 30s');
    expect(humanizeDuration(3_600_000)).toBe('1h');
    expect(humanizeDuration((25 * 3600 + 61) * 1000)).toBe('25h 1m');
  });

  it('ignores the sign', () => {
    expect(humanizeDuration(-120_000)).toBe('2m');
  });
});

describe('computeAutoCloseMeta', () => {
  it('flags an expired auto-close deadline as overdue', () => {
    const meta = computeAutoCloseMeta({ until_time: nowEpoch - 3600 }, 'pending auto close+', 5, NOW);

    expect(meta).toEqual({
      pending: true,
      overdue: true,
      relative: '1h',
      at: '2024-03-10 11:00:00 UTC',
      atISO: '2024-03-10T11:00:00Z',
    });
  });

  it('returns only the pending flag for other states without a deadline', () => {
    expect(computeAutoCloseMeta({ until_time: 0 }, 'open', 2, NOW)).toEqual({ pending: false });
  });

  it('describes a stored deadline even outside pending states', () => {
    const meta = computeAutoCloseMeta({ until_time: nowEpoch + 90 }, 'open', 2, NOW);
    expect(meta).toMatchObject({ pending: false, overdue: false, relative: '1m 30s' });
  });
});

describe('computeReminderMeta', () => {
  it('marks the synthetic default deadline', () => {
    const meta = computeReminderMeta({ until_time: 0 }, 'pending reminder', 4, NOW);

    expect(meta).toEqual({
      pending: true,
      hasTime: false,
      overdue: false,
      relative: '24h',
      at: '2024-03-11 12:00:00 UTC',
      atISO: '2024-03-11T12:00:00Z',
      message: DEFAULT_REMINDER_MESSAGE,
    });
  });

  it('omits the message for a stored deadline', () => {
    const meta = computeReminderMeta({ until_time: nowEpoch + 1800 }, 'pending reminder', 4, NOW);

    expect(meta.hasTime).toBe(true);
    expect(meta.relative).toBe('30m');
    expect(meta.message).toBeUndefined();
  });
});

describe('computeReminderMeta with a corrupt stored deadline', () => {
  it('describes the default deadline instead of throwing', () => {
    expect(computeReminderMeta({ until_time: 99_999_999_999_999 }, 'pending reminder', 4, NOW)).toEqual({
      pending: true,
      hasTime: true,
      at: '2024-03-11 12:00:00 UTC',
      atISO: '2024-03-11T12:00:00Z',
      overdue: false,
      relative: '24h',
    });
  });
});

describe('parsePendingUntil', () => {
  it('accepts epoch seconds', () => {
    expect(parsePendingUntil('1710000000', 'UTC')).toBe(1710000000);
  });

  it('reads wall-clock input in the configured zone', () => {
    expect(parsePendingUntil('2024-03-10T14:30', 'UTC')).toBe(Date.UTC(2024, 2, 10, 14, 30) / 1000);
    expect(parsePendingUntil('2024-03-10 14:30:15', 'UTC')).toBe(Date.UTC(2024, 2, 10, 14, 30, 15) / 1000);
    expect(parsePendingUntil('2024-03-10 14:30', 'Europe/Berlin')).toBe(Date.UTC(2024, 2, 10, 13, 30) / 1000);
  });

  it('honors an explicit offset', () => {
    expect(parsePendingUntil('2024-03-10T14:30:00+02:00', 'Europe/Berlin')).toBe(
      Date.UTC(2024, 2, 10, 12, 30) / 1000,
    );
    expect(parsePendingUntil('2024-03-10T14:30:00Z', 'Europe/Berlin')).toBe(Date.UTC(2024, 2, 10, 14, 30) / 1000);
  });

  it('returns 0 for empty or unparsable input', () => {
    expect(parsePendingUntil('', 'UTC')).toBe(0);
    expect(parsePendingUntil(undefined, 'UTC')).toBe(0);
    expect(parsePendingUntil('tomorrow', 'UTC')).toBe(0);
    expect(parsePendingUntil('2024-13-40 10:00', 'UTC')).toBe(0);
  });

  it('rejects epochs that do not map to a valid date', () => {
    expect(parsePendingUntil('99999999999999', 'UTC')).toBe(0);
    expect(parsePendingUntil('8640000000001', 'UTC')).toBe(0);
    expect(parsePendingUntil('8640000000000', 'UTC')).toBe(8_640_000_000_000);
  });
});

describe('formatPendingUntil', () => {
  it('renders day, month name and time in the zone', () => {
    const epoch = Date.UTC(2024, 2, 10, 13, 30) / 1000;
    expect(formatPendingUntil(epoch, 'UTC')).toBe('10 Mar 2024 13:30');
    expect(formatPendingUntil(epoch, 'Europe/Berlin')).toBe('10 Mar 2024 14:30');
  });
});
