// ──────────────────────────────────────────
// Analytics: Daily rollup + resampled time series
// ──────────────────────────────────────────

import { Interval, Sale, TimeSeriesPoint, TimeSeriesResult, TimeSeriesSummary } from '../../shared/types';
import { bucketRange, bucketStart } from './time-buckets';

export const ROLLING_WINDOW = 7;

interface DailyRow {
  date: string;
  total_sales: number;
  transaction_count: number;
  average_order_value: number;
  total_quantity: number;
}

interface BucketAccumulator {
  total_sales: number;
  transaction_count: number;
  total_quantity: number;
  daily_averages: number[];
}

export function buildTimeSeries(sales: Sale[], interval: Interval): TimeSeriesResult {
  const daily = rollupDays(sales);
  if (daily.length === 0) {
    return { kind: 'time_series', interval, summary: emptySummary(), detail: [] };
  }

  const buckets = new Map<string, BucketAccumulator>();
  for (const day of daily) {
    const label = bucketStart(day.date, interval);
    let acc = buckets.get(label);
    if (!acc) {
      acc = { total_sales: 0, transaction_count: 0, total_quantity: 0, daily_averages: [] };
      buckets.set(label, acc);
    }
    // Volumes are summed, rates are averaged
    acc.total_sales += day.total_sales;
    acc.transaction_count += day.transaction_count;
    acc.total_quantity += day.total_quantity;
    acc.daily_averages.push(day.average_order_value);
  }

  const first = bucketStart(daily[0].date, interval);
  const last = bucketStart(daily[daily.length - 1].date, interval);
  const totals: number[] = [];
  const detail: TimeSeriesPoint[] = [];

  for (const label of bucketRange(first, last, interval)) {
    const acc = buckets.get(label);
    const totalSales = acc?.total_sales ?? 0;
    const previous = totals.length > 0 ? totals[totals.length - 1] : null;
    totals.push(totalSales);

    detail.push({
      date: label,
      total_sales: totalSales,
      transaction_count: acc?.transaction_count ?? 0,
      average_order_value: acc ? mean(acc.daily_averages) : 0,
      total_quantity: acc?.total_quantity ?? 0,
      growth_rate: previous === null ? null : growthRate(previous, totalSales),
      rolling_avg: mean(totals.slice(-ROLLING_WINDOW)),
    });
  }

  return { kind: 'time_series', interval, summary: summarize(detail), detail };
}

/** Percentage change; null when there is no base to compare against. */
export function growthRate(previous: number, current: number): number | null {
  if (previous === 0) return null;
  return ((current - previous) / previous) * 100;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

// ── Helpers ──

function rollupDays(sales: Sale[]): DailyRow[] {
  const map = new Map<string, DailyRow>();

  for (const sale of sales) {
    let row = map.get(sale.date);
    if (!row) {
      row = { date: sale.date, total_sales: 0, transaction_count: 0, average_order_value: 0, total_quantity: 0 };
      map.set(sale.date, row);
    }
    row.total_sales += sale.total;
    row.transaction_count += 1;
    row.total_quantity += sale.quantity;
  }

  const rows = Array.from(map.values()).sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  for (const row of rows) {
    row.average_order_value = row.total_sales / row.transaction_count;
  }
  return rows;
}

function summarize(detail: TimeSeriesPoint[]): TimeSeriesSummary {
  const sales = detail.map((p) => p.total_sales);
  const transactions = detail.map((p) => p.transaction_count);
  const growth = detail
    .map((p) => p.growth_rate)
    .filter((g): g is number => g !== null);

  return {
    total_sales: sum(sales),
    avg_sales: mean(sales),
    // No spread: a daily series can exceed the call argument limit
    max_sales: sales.reduce((m, v) => (v > m ? v : m), sales[0]),
    min_sales: sales.reduce((m, v) => (v < m ? v : m), sales[0]),
    total_transactions: sum(transactions),
    avg_transactions: mean(transactions),
    avg_order_value: mean(detail.map((p) => p.average_order_value)),
    total_quantity: sum(detail.map((p) => p.total_quantity)),
    avg_growth_rate: mean(growth),
    bucket_count: detail.length,
  };
}

function emptySummary(): TimeSeriesSummary {
  return {
    total_sales: 0,
    avg_sales: 0,
    max_sales: 0,
    min_sales: 0,
    total_transactions: 0,
    avg_transactions: 0,
    avg_order_value: 0,
    total_quantity: 0,
    avg_growth_rate: 0,
    bucket_count: 0,
  };
}

function sum(values: readonly number[]): number {
  return values.reduce((s, v) => s + v, 0);
}
