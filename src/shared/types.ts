// ──────────────────────────────────────────
// Shared type definitions for the sales ledger
// ──────────────────────────────────────────

export type Interval = 'day' | 'week' | 'month' | 'quarter' | 'year';
export type AnalysisKind = 'time_series' | 'product' | 'customer' | 'overview';
export type SignatureKind = AnalysisKind | 'ingestion';

export const INTERVALS: readonly Interval[] = ['day', 'week', 'month', 'quarter', 'year'];

export type RejectionReason =
  | 'missing_invoice_id'
  | 'invalid_date'
  | 'invalid_time'
  | 'invalid_number'
  | 'missing_amount'
  | 'negative_unit_price'
  | 'invalid_quantity'
  | 'negative_total'
  | 'rating_out_of_range'
  | 'value_too_long'
  | 'duplicate_invoice_id';

export type RawSaleRecord = Record<string, unknown>;

export interface Sale {
  invoice_id: string;
  branch: string;
  city: string;
  customer_type: string;
  gender: string;
  product_line: string;
  unit_price: number;
  quantity: number;
  total: number;
  date: string; // YYYY-MM-DD
  time: string | null; // HH:MM
  payment: string;
  cogs: number;
  gross_margin_percentage: number;
  gross_income: number;
  rating: number | null;
}

export interface RowRejection {
  row: number;
  invoice_id: string | null;
  reason: RejectionReason;
  field?: string;
}

export interface ValidationResult {
  records: Sale[];
  rejected: RowRejection[];
  duplicates: number;
}

export interface DateScope {
  start: string | null;
  end: string | null;
}

export interface QuerySignature {
  kind: SignatureKind;
  start: string | null;
  end: string | null;
  interval: Interval | null;
  batch_key?: string;
}

// ── Time series ──

export interface TimeSeriesPoint {
  date: string;
  total_sales: number;
  transaction_count: number;
  average_order_value: number;
  total_quantity: number;
  growth_rate: number | null;
  rolling_avg: number;
}

export interface TimeSeriesSummary {
  total_sales: number;
  avg_sales: number;
  max_sales: number;
  min_sales: number;
  total_transactions: number;
  avg_transactions: number;
  avg_order_value: number;
  total_quantity: number;
  avg_growth_rate: number;
  bucket_count: number;
}

export interface TimeSeriesResult {
  kind: 'time_series';
  interval: Interval;
  summary: TimeSeriesSummary;
  detail: TimeSeriesPoint[];
}

// ── Products ──

export interface ProductSummary {
  product_line: string;
  total_sales: number;
  total_quantity: number;
  avg_price: number;
  transaction_count: number;
  avg_rating: number | null;
  sales_per_transaction: number;
}

export interface ProductRollup {
  total_products: number;
  total_sales: number;
  total_quantity: number;
  avg_price: number;
  total_transactions: number;
}

export interface ProductResult {
  kind: 'product';
  summary: ProductRollup;
  products: ProductSummary[];
}

// ── Customers ──

export interface CustomerSummary {
  customer_type: string;
  gender: string;
  transaction_count: number;
  total_spent: number;
  avg_order_value: number;
  unique_visits: number;
  avg_rating: number | null;
  visit_frequency: number;
}

export interface CustomerRollup {
  total_segments: number;
  total_transactions: number;
  total_revenue: number;
  avg_order_value: number;
  avg_rating: number;
}

export interface CustomerResult {
  kind: 'customer';
  summary: CustomerRollup;
  customers: CustomerSummary[];
}

// ── Overview ──

export interface OverviewTotals {
  total_sales: number;
  total_transactions: number;
  average_order_value: number;
  total_quantity: number;
}

export interface OverviewProductLine {
  product_line: string;
  total_sales: number;
  total_quantity: number;
  avg_price: number;
}

export interface OverviewCustomerType {
  customer_type: string;
  transaction_count: number;
  total_sales: number;
  avg_order_value: number;
}

export interface OverviewResult {
  kind: 'overview';
  summary: OverviewTotals;
  products: OverviewProductLine[];
  customers: OverviewCustomerType[];
}

// ── Ingestion ──

export interface IngestionReport {
  batch_id: string;
  received: number;
  accepted: number;
  duplicates: number;
  inserted: number;
  rejected: RowRejection[];
}
