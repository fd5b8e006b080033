// ──────────────────────────────────────────
// Analytics: Calendar bucket arithmetic
// ──────────────────────────────────────────

import { Interval } from '../../shared/types';
import { formatDate, parseDate } from '../../shared/dates';

/** First day of the bucket containing `date`. Weeks start on Monday. */
export function bucketStart(date: string, interval: Interval): string {
  const d = parseDate(date);

  switch (interval) {
    case 'day':
      return formatDate(d);
    case 'week': {
      const offset = (d.getUTCDay() + 6) % 7;
      d.setUTCDate(d.getUTCDate() - offset);
      return formatDate(d);
    }
    case 'month':
      return formatDate(new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), 1)));
    case 'quarter':
      return formatDate(new Date(Date.UTC(d.getUTCFullYear(), Math.floor(d.getUTCMonth() / 3) * 3, 1)));
    case 'year':
      return formatDate(new Date(Date.UTC(d.getUTCFullYear(), 0, 1)));
  }
}

export function nextBucket(start: string, interval: Interval): string {
  return formatDate(advance(parseDate(start), interval));
}

/** Every bucket label from `first` to `last` inclusive; both must be bucket starts. */
export function bucketRange(first: string, last: string, interval: Interval): string[] {
  const labels: string[] = [];
  const end = parseDate(last).getTime();
  // Compared as epoch ms: labels past year 9999 do not sort as strings
  for (let d = parseDate(first); d.getTime() <= end; d = advance(d, interval)) {
    labels.push(formatDate(d));
  }
  return labels;
}

function advance(start: Date, interval: Interval): Date {
  const d = new Date(start.getTime());

  switch (interval) {
    case 'day':
      d.setUTCDate(d.getUTCDate() + 1);
      break;
    case 'week':
      d.setUTCDate(d.getUTCDate() + 7);
      break;
    case 'month':
      d.setUTCMonth(d.getUTCMonth() + 1);
      break;
    case 'quarter':
      d.setUTCMonth(d.getUTCMonth() + 3);
      break;
    case 'year':
      d.setUTCFullYear(d.getUTCFullYear() + 1);
      break;
  }
  return d;
}
