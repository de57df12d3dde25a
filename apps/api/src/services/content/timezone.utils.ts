// =====================================================
// Timezone Utilities for Content Rendering
// =====================================================
// Renders clock and date strings in the device's time zone.
//
// Uses Intl.DateTimeFormat.
// All functions accept the date to render for deterministic testing.

export const DEFAULT_TIMEZONE = 'UTC';

export interface LocalTime {
  hours: number;
  minutes: number;
}

/**
 * Get the local wall-clock time in a given IANA timezone.
 */
export function getLocalTime(timezone: string, date: Date): LocalTime {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    hour: 'numeric',
    minute: 'numeric',
    hour12: false,
  });

  const parts = formatter.formatToParts(date);
  // Intl hour12: false can return '24' at midnight, normalize to 0
  const rawHour = parseInt(parts.find((p) => p.type === 'hour')?.value ?? '0', 10);
  const hours = rawHour === 24 ? 0 : rawHour;
  const minutes = parseInt(parts.find((p) => p.type === 'minute')?.value ?? '0', 10);

  return { hours, minutes };
}

/**
 * Last millisecond of the local calendar day containing `date`.
 * Assumes no DST transition between `date` and local midnight.
 */
export function getEndOfLocalDay(timezone: string, date: Date): Date {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
    hour12: false,
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    parseInt(parts.find((p) => p.type === type)?.value ?? '0', 10);

  const hours = part('hour') % 24;
  const elapsedMs =
    ((hours * 60 + part('minute')) * 60 + part('second')) * 1000 + date.getUTCMilliseconds();

  return new Date(date.getTime() + (24 * 60 * 60 * 1000 - elapsedMs) - 1);
}

/**
 * 24-hour "HH:mm" string, as shown in the transcript line.
 */
export function formatClock(timezone: string, date: Date): string {
  const { hours, minutes } = getLocalTime(timezone, date);
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * 12-hour "h:mm AM" string used for event and email times.
 */
export function formatTimeOfDay(timezone: string, date: Date): string {
  return new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    hour: 'numeric',
    minute: '2-digit',
    hour12: true,
  })
    .format(date)
    // Newer ICU data separates the meridiem with a narrow no-break space
    .replace(/\u202f/g, ' ');
}

/**
 * Short display date, e.g. "Mon, Oct 19".
 */
export function formatDisplayDate(timezone: string, date: Date): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    weekday: 'short',
    month: 'short',
    day: '2-digit',
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${part('weekday')}, ${part('month')} ${part('day')}`;
}

/**
 * Dark styling applies before 07:00 and from 19:00 local time.
 */
export function isDarkHour(hours: number): boolean {
  return hours < 7 || hours >= 19;
}

/**
 * Validate and resolve an IANA timezone string.
 * Invalid timezones fall back to the default zone.
 */
export function resolveTimezone(
  timezone: string | null | undefined,
  fallback: string = DEFAULT_TIMEZONE,
): string {
  if (!timezone) return fallback;
  try {
    Intl.DateTimeFormat(undefined, { timeZone: timezone });
    return timezone;
  } catch {
    return fallback;
  }
}
