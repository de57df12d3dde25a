// =====================================================
// Content Timezone Utilities Test Suite
// =====================================================
// America/New_York in March 2024 observes EDT (UTC-4).

import { describe, it, expect } from 'vitest';
import {
  formatClock,
  formatDisplayDate,
  formatTimeOfDay,
  getEndOfLocalDay,
  getLocalTime,
  isDarkHour,
  resolveTimezone,
} from '../timezone.utils';

// 2024-03-15 17:00 UTC → 13:00 EDT, Friday
const NY_1PM = new Date('2024-03-15T17:00:00.000Z');

// 2024-03-16 04:00 UTC → 00:00 EDT
const NY_MIDNIGHT = new Date('2024-03-16T04:00:00.000Z');

// 2024-03-15 13:05 UTC → 09:05 EDT
const NY_905AM = new Date('2024-03-15T13:05:00.000Z');

describe('getLocalTime', () => {
  it('converts UTC to the zone wall clock', () => {
    expect(getLocalTime('America/New_York', NY_1PM)).toEqual({ hours: 13, minutes: 0 });
  });

  it('reports midnight as hour 0', () => {
    expect(getLocalTime('America/New_York', NY_MIDNIGHT)).toEqual({ hours: 0, minutes: 0 });
  });
});

describe('getEndOfLocalDay', () => {
  it('ends the day at local midnight, not UTC midnight', () => {
    expect(getEndOfLocalDay('America/New_York', NY_1PM).toISOString()).toBe('2024-03-16T03:59:59.999Z');
    expect(getEndOfLocalDay('UTC', NY_1PM).toISOString()).toBe('2024-03-15T23:59:59.999Z');
  });

  it('treats local midnight as the start of a new day', () => {
    expect(getEndOfLocalDay('America/New_York', NY_MIDNIGHT).toISOString()).toBe('2024-03-17T03:59:59.999Z');
  });
});

describe('formatClock', () => {
  it('zero-pads hours and minutes', () => {
    expect(formatClock('America/New_York', NY_905AM)).toBe('09:05');
    expect(formatClock('America/New_York', NY_MIDNIGHT)).toBe('00:00');
  });

  it('uses 24-hour time', () => {
    expect(formatClock('UTC', NY_1PM)).toBe('17:00');
  });
});

describe('formatTimeOfDay', () => {
  it('renders 12-hour time with a plain space before the meridiem', () => {
    expect(formatTimeOfDay('America/New_York', NY_1PM)).toBe('1:00 PM');
    expect(formatTimeOfDay('America/New_York', NY_905AM)).toBe('9:05 AM');
  });
});

describe('formatDisplayDate', () => {
  it('renders weekday, month and two-digit day', () => {
    expect(formatDisplayDate('America/New_York', NY_1PM)).toBe('Fri, Mar 15');
    expect(formatDisplayDate('UTC', new Date('2024-10-05T12:00:00.000Z'))).toBe('Sat, Oct 05');
  });

  it('uses the local date, not the UTC date', () => {
    // 2024-03-16 02:00 UTC is still Friday evening in New York
    expect(formatDisplayDate('America/New_York', new Date('2024-03-16T02:00:00.000Z'))).toBe('Fri, Mar 15');
  });
});

describe('isDarkHour', () => {
  it('is dark before 07:00 and from 19:00', () => {
    expect(isDarkHour(0)).toBe(true);
    expect(isDarkHour(6)).toBe(true);
    expect(isDarkHour(7)).toBe(false);
    expect(isDarkHour(18)).toBe(false);
    expect(isDarkHour(19)).toBe(true);
    expect(isDarkHour(23)).toBe(true);
  });
});

describe('resolveTimezone', () => {
  it('keeps a valid IANA zone', () => {
    expect(resolveTimezone('Europe/London')).toBe('Europe/London');
  });

  it('falls back to UTC for missing or invalid zones', () => {
    expect(resolveTimezone(undefined)).toBe('UTC');
    expect(resolveTimezone(null)).toBe('UTC');
    expect(resolveTimezone('')).toBe('UTC');
    expect(resolveTimezone('Not/AZone')).toBe('UTC');
  });

  it('honours a custom fallback', () => {
    expect(resolveTimezone('Not/AZone', 'Asia/Tokyo')).toBe('Asia/Tokyo');
  });
});
