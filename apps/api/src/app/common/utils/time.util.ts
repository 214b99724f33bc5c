const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

// DATETIME columns come back without a zone; those values are already UTC.
const NAIVE_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?$/;

export interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

/**
 * Canonicalizes a stored or user-supplied timestamp to a UTC instant.
 * A value without zone information is tagged as UTC, never read as server-local.
 */
export function toUtcDate(value: Date | string | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new Error('Invalid date value');
    }
    return new Date(value.getTime());
  }

  const text = value.trim();
  if (!text) return null;

  const naive = NAIVE_TIMESTAMP.exec(text);
  const iso = naive ? naiveToIso(naive) : text;
  const parsed = new Date(iso);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid timestamp: ${value}`);
  }
  return parsed;
}

function naiveToIso(match: RegExpExecArray) {
  const [, date, hh = '00', mm = '00', ss = '00', fraction = ''] = match;
  const millis = `${fraction}000`.slice(0, 3);
  return `${date}T${hh}:${mm}:${ss}.${millis}Z`;
}

export function addMinutes(instant: Date, minutes: number): Date {
  return new Date(instant.getTime() + minutes * MINUTE_MS);
}

export function addUtcDays(instant: Date, days: number): Date {
  return new Date(instant.getTime() + days * DAY_MS);
}

export function startOfUtcDay(instant: Date): Date {
  return new Date(
    Date.UTC(instant.getUTCFullYear(), instant.getUTCMonth(), instant.getUTCDate())
  );
}

export function laterOf(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string) {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone.trim()) return false;
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

export function zonedParts(instant: Date, timeZone: string): ZonedParts {
  const parts = formatterFor(timeZone).formatToParts(instant);
  const pick = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find((part) => part.type === type)?.value ?? 0);
  return {
    year: pick('year'),
    month: pick('month'),
    day: pick('day'),
    hour: pick('hour'),
    minute: pick('minute'),
    second: pick('second'),
  };
}

function pad(value: number, width = 2) {
  return String(value).padStart(width, '0');
}

export function formatDateOnly(parts: Pick<ZonedParts, 'year' | 'month' | 'day'>): string {
  return `${pad(parts.year, 4)}-${pad(parts.month)}-${pad(parts.day)}`;
}

/** Wall-clock `YYYY-MM-DD HH:mm:ss` of an instant in the given IANA zone. */
export function formatInTimeZone(instant: Date, timeZone: string): string {
  const p = zonedParts(instant, timeZone);
  return `${formatDateOnly(p)} ${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}`;
}

/** Monday of the calendar week containing the given local date. */
export function mondayOf(parts: Pick<ZonedParts, 'year' | 'month' | 'day'>): string {
  const midnight = Date.UTC(parts.year, parts.month - 1, parts.day);
  const offset = (new Date(midnight).getUTCDay() + 6) % 7;
  const monday = new Date(midnight - offset * DAY_MS);
  return formatDateOnly({
    year: monday.getUTCFullYear(),
    month: monday.getUTCMonth() + 1,
    day: monday.getUTCDate(),
  });
}
