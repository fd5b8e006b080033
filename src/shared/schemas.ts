// ──────────────────────────────────────────
// Zod schemas for payloads read back from the cache
// ──────────────────────────────────────────

import { z } from 'zod';
import {
  CustomerResult,
  IngestionReport,
  OverviewResult,
  ProductResult,
  RejectionReason,
  TimeSeriesResult,
} from './types';

const num = z.number().finite();
const count = z.number().int().nonnegative();

const rejectionReasons: [RejectionReason, ...RejectionReason[]] = [
  'missing_invoice_id',
  'invalid_date',
  'invalid_time',
  'invalid_number',
  'missing_amount',
  'negative_unit_price',
  'invalid_quantity',
  'negative_total',
  'rating_out_of_range',
  'value_too_long',
  'duplicate_invoice_id',
];

export const timeSeriesResultSchema: z.ZodType<TimeSeriesResult> = z
  .object({
    kind: z.literal('time_series'),
    interval: z.enum(['day', 'week', 'month', 'quarter', 'year']),
    summary: z
      .object({
        total_sales: num,
        avg_sales: num,
        max_sales: num,
        min_sales: num,
        total_transactions: count,
        avg_transactions: num,
        avg_order_value: num,
        total_quantity: count,
        avg_growth_rate: num,
        bucket_count: count,
      })
      .strict(),
    detail: z.array(
      z
        .object({
          date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
          total_sales: num,
          transaction_count: count,
          average_order_value: num,
          total_quantity: count,
          growth_rate: num.nullable(),
          rolling_avg: num,
        })
        .strict()
    ),
  })
  .strict();

export const productResultSchema: z.ZodType<ProductResult> = z
  .object({
    kind: z.literal('product'),
    summary: z
      .object({
        total_products: count,
        total_sales: num,
        total_quantity: count,
        avg_price: num,
        total_transactions: count,
      })
      .strict(),
    products: z.array(
      z
        .object({
          product_line: z.string(),
          total_sales: num,
          total_quantity: count,
          avg_price: num,
          transaction_count: count,
          avg_rating: num.nullable(),
          sales_per_transaction: num,
        })
        .strict()
    ),
  })
  .strict();

export const customerResultSchema: z.ZodType<CustomerResult> = z
  .object({
    kind: z.literal('customer'),
    summary: z
      .object({
        total_segments: count,
        total_transactions: count,
        total_revenue: num,
        avg_order_value: num,
        avg_rating: num,
      })
      .strict(),
    customers: z.array(
      z
        .object({
          customer_type: z.string(),
          gender: z.string(),
          transaction_count: count,
          total_spent: num,
          avg_order_value: num,
          unique_visits: count,
          avg_rating: num.nullable(),
          visit_frequency: num,
        })
        .strict()
    ),
  })
  .strict();

export const overviewResultSchema: z.ZodType<OverviewResult> = z
  .object({
    kind: z.literal('overview'),
    summary: z
      .object({
        total_sales: num,
        total_transactions: count,
        average_order_value: num,
        total_quantity: count,
      })
      .strict(),
    products: z.array(
      z
        .object({
          product_line: z.string(),
          total_sales: num,
          total_quantity: count,
          avg_price: num,
        })
        .strict()
    ),
    customers: z.array(
      z
        .object({
          customer_type: z.string(),
          transaction_count: count,
          total_sales: num,
          avg_order_value: num,
        })
        .strict()
    ),
  })
  .strict();

export const ingestionReportSchema: z.ZodType<IngestionReport> = z
  .object({
    batch_id: z.string().uuid(),
    received: count,
    accepted: count,
    duplicates: count,
    inserted: count,
    rejected: z.array(
      z
        .object({
          row: count,
          invoice_id: z.string().nullable(),
          reason: z.enum(rejectionReasons),
          field: z.string().optional(),
        })
        .strict()
    ),
  })
  .strict();
