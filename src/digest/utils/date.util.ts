export const DAY_MS = 24 * 60 * 60 * 1000;

const ZONE_SUFFIX_RE = /(?:z|[+-]\d{2}(?::?\d{2})?)$/i;
const DATE_ONLY_RE = /^\d{4}-\d{2}-\d{2}$/;
const NAIVE_DATETIME_RE = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;

/**
 * Parses an instant and pins zone-less values to UTC, so a naive
 * "2026-03-01T12:00:00" is never read in the host's local zone.
 */
export function parseUtcDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }
  if (typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  let normalized = trimmed;
  if (DATE_ONLY_RE.test(trimmed)) {
    normalized = `${trimmed}T00:00:00Z`;
  } else if (NAIVE_DATETIME_RE.test(trimmed) && !ZONE_SUFFIX_RE.test(trimmed)) {
    normalized = `${trimmed.replace(' ', 'T')}Z`;
  }

  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/** Whole days from `from` to `to`, floored toward negative infinity. */
export function wholeDaysBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / DAY_MS);
}

export function daysUntil(target: Date, now: Date): number {
  return wholeDaysBetween(now, target);
}

export function daysSince(past: Date, now: Date): number {
  return wholeDaysBetween(past, now);
}

function zonedParts(date: Date, timeZone: string): Record<string, string> {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const out: Record<string, string> = {};
  for (const part of parts) {
    out[part.type] = part.value;
  }
  return out;
}

export function formatZonedDate(date: Date, timeZone: string): string {
  const parts = zonedParts(date, timeZone);
  return `${parts.year}-${parts.month}-${parts.day}`;
}

export function formatZonedTime(date: Date, timeZone: string): string {
  const parts = zonedParts(date, timeZone);
  return `${parts.hour}:${parts.minute}`;
}
