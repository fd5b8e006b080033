// ──────────────────────────────────────────
// Analytics: Query scope parsing
// ──────────────────────────────────────────

import { DateScope, Interval, INTERVALS } from '../../shared/types';
import { AggregationError } from '../../shared/errors';
import { toCalendarDate } from '../../shared/dates';

export type DateInput = string | Date | null | undefined;

export function resolveScope(start?: DateInput, end?: DateInput): DateScope {
  const scope: DateScope = {
    start: resolveBound('start', start),
    end: resolveBound('end', end),
  };
  assertScope(scope);
  return scope;
}

export function assertScope(scope: DateScope): void {
  if (scope.start !== null && scope.end !== null && scope.end < scope.start) {
    throw new AggregationError(`End date ${scope.end} precedes start date ${scope.start}`);
  }
}

export function isInterval(value: unknown): value is Interval {
  return typeof value === 'string' && INTERVALS.some((i) => i === value);
}

export function parseInterval(value: unknown, fallback: Interval = 'day'): Interval {
  if (value === undefined || value === null || value === '') return fallback;
  if (!isInterval(value)) {
    throw new AggregationError(`Unsupported interval: ${String(value)} (expected one of ${INTERVALS.join(', ')})`);
  }
  return value;
}

function resolveBound(name: 'start' | 'end', value: DateInput): string | null {
  if (value === undefined || value === null || value === '') return null;
  const date = toCalendarDate(value);
  if (!date) throw new AggregationError(`Invalid ${name} date: ${String(value)}`);
  return date;
}
