// ──────────────────────────────────────────
// Calendar-date helpers (UTC, YYYY-MM-DD)
// ──────────────────────────────────────────

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

// Every bucket of a date in this range, and the bucket after it, has a four-digit year
export const MIN_YEAR = 1000;
export const MAX_YEAR = 9998;

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function parseDate(calendarDate: string): Date {
  return new Date(`${calendarDate}T00:00:00.000Z`);
}

/**
 * Reduces a date-ish value to its calendar date. Accepts Date objects,
 * ISO dates or date-times (the written date is kept, offsets are ignored)
 * and M/D/YYYY. Returns null for anything else, including impossible
 * dates such as 2023-02-30 and years outside MIN_YEAR..MAX_YEAR.
 */
export function toCalendarDate(value: unknown): string | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    const year = value.getUTCFullYear();
    return year < MIN_YEAR || year > MAX_YEAR ? null : formatDate(value);
  }
  if (typeof value !== 'string') return null;

  const text = value.trim();
  const iso = ISO_DATE.exec(text);
  if (iso) return fromParts(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const us = US_DATE.exec(text);
  if (us) return fromParts(Number(us[3]), Number(us[1]), Number(us[2]));

  return null;
}

function fromParts(year: number, month: number, day: number): string | null {
  if (year < MIN_YEAR || year > MAX_YEAR) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return formatDate(date);
}
