// ──────────────────────────────────────────
// Analytics: Aggregation engine — grouped statistics over the ledger
// ──────────────────────────────────────────

import { SalesLedger } from '../../shared/contracts';
import {
  CustomerResult,
  CustomerSummary,
  DateScope,
  Interval,
  OverviewCustomerType,
  OverviewProductLine,
  OverviewResult,
  ProductResult,
  ProductSummary,
  Sale,
  TimeSeriesResult,
} from '../../shared/types';
import { AggregationError } from '../../shared/errors';
import { assertScope, isInterval } from './scope';
import { buildTimeSeries, mean } from './time-series';

export class AggregationEngine {
  constructor(private ledger: SalesLedger) {}

  async timeSeries(scope: DateScope, interval: Interval): Promise<TimeSeriesResult> {
    if (!isInterval(interval)) {
      throw new AggregationError(`Unsupported interval: ${String(interval)}`);
    }
    const sales = await this.load(scope);
    return buildTimeSeries(sales, interval);
  }

  async productAnalysis(scope: DateScope): Promise<ProductResult> {
    return buildProductAnalysis(await this.load(scope));
  }

  async customerAnalysis(scope: DateScope): Promise<CustomerResult> {
    return buildCustomerAnalysis(await this.load(scope));
  }

  async overview(scope: DateScope): Promise<OverviewResult> {
    return buildOverview(await this.load(scope));
  }

  private async load(scope: DateScope): Promise<Sale[]> {
    assertScope(scope);
    const sales = await this.ledger.query(scope);
    console.log(`[Analytics] Loaded ${sales.length} sales for ${scope.start ?? '*'}..${scope.end ?? '*'}`);
    return sales;
  }
}

// ── Product analysis ──

export function buildProductAnalysis(sales: Sale[]): ProductResult {
  const groups = new Map<string, { sales: number; quantity: number; prices: number[]; ratings: number[] }>();

  for (const sale of sales) {
    let g = groups.get(sale.product_line);
    if (!g) {
      g = { sales: 0, quantity: 0, prices: [], ratings: [] };
      groups.set(sale.product_line, g);
    }
    g.sales += sale.total;
    g.quantity += sale.quantity;
    g.prices.push(sale.unit_price);
    if (sale.rating !== null) g.ratings.push(sale.rating);
  }

  const products: ProductSummary[] = sortedEntries(groups).map(([productLine, g]) => {
    const count = g.prices.length;
    return {
      product_line: productLine,
      total_sales: g.sales,
      total_quantity: g.quantity,
      avg_price: mean(g.prices),
      transaction_count: count,
      avg_rating: g.ratings.length > 0 ? mean(g.ratings) : null,
      sales_per_transaction: count > 0 ? g.sales / count : 0,
    };
  });

  return {
    kind: 'product',
    summary: {
      total_products: products.length,
      total_sales: products.reduce((s, p) => s + p.total_sales, 0),
      total_quantity: products.reduce((s, p) => s + p.total_quantity, 0),
      avg_price: mean(products.map((p) => p.avg_price)),
      total_transactions: products.reduce((s, p) => s + p.transaction_count, 0),
    },
    products,
  };
}

// ── Customer analysis ──

interface SegmentAccumulator {
  customer_type: string;
  gender: string;
  count: number;
  spent: number;
  invoices: Set<string>;
  ratings: number[];
}

export function buildCustomerAnalysis(sales: Sale[]): CustomerResult {
  const groups = new Map<string, SegmentAccumulator>();

  for (const sale of sales) {
    const key = `${sale.customer_type}\u0000${sale.gender}`;
    let g = groups.get(key);
    if (!g) {
      g = { customer_type: sale.customer_type, gender: sale.gender, count: 0, spent: 0, invoices: new Set(), ratings: [] };
      groups.set(key, g);
    }
    g.count += 1;
    g.spent += sale.total;
    g.invoices.add(sale.invoice_id);
    if (sale.rating !== null) g.ratings.push(sale.rating);
  }

  const customers: CustomerSummary[] = sortedEntries(groups).map(([, g]) => ({
    customer_type: g.customer_type,
    gender: g.gender,
    transaction_count: g.count,
    total_spent: g.spent,
    avg_order_value: g.count > 0 ? g.spent / g.count : 0,
    unique_visits: g.invoices.size,
    avg_rating: g.ratings.length > 0 ? mean(g.ratings) : null,
    visit_frequency: g.invoices.size > 0 ? g.count / g.invoices.size : 0,
  }));

  return {
    kind: 'customer',
    summary: {
      total_segments: customers.length,
      total_transactions: customers.reduce((s, c) => s + c.transaction_count, 0),
      total_revenue: customers.reduce((s, c) => s + c.total_spent, 0),
      avg_order_value: mean(customers.map((c) => c.avg_order_value)),
      avg_rating: mean(customers.map((c) => c.avg_rating ?? 0)),
    },
    customers,
  };
}

// ── Overview ──

export function buildOverview(sales: Sale[]): OverviewResult {
  const totalSales = sales.reduce((s, r) => s + r.total, 0);
  const lines = new Map<string, { sales: number; quantity: number; prices: number[] }>();
  const types = new Map<string, { sales: number; count: number }>();

  for (const sale of sales) {
    let line = lines.get(sale.product_line);
    if (!line) {
      line = { sales: 0, quantity: 0, prices: [] };
      lines.set(sale.product_line, line);
    }
    line.sales += sale.total;
    line.quantity += sale.quantity;
    line.prices.push(sale.unit_price);

    let type = types.get(sale.customer_type);
    if (!type) {
      type = { sales: 0, count: 0 };
      types.set(sale.customer_type, type);
    }
    type.sales += sale.total;
    type.count += 1;
  }

  const products: OverviewProductLine[] = sortedEntries(lines).map(([productLine, l]) => ({
    product_line: productLine,
    total_sales: l.sales,
    total_quantity: l.quantity,
    avg_price: mean(l.prices),
  }));

  const customers: OverviewCustomerType[] = sortedEntries(types).map(([customerType, t]) => ({
    customer_type: customerType,
    transaction_count: t.count,
    total_sales: t.sales,
    avg_order_value: t.count > 0 ? t.sales / t.count : 0,
  }));

  return {
    kind: 'overview',
    summary: {
      total_sales: totalSales,
      total_transactions: sales.length,
      average_order_value: sales.length > 0 ? totalSales / sales.length : 0,
      total_quantity: sales.reduce((s, r) => s + r.quantity, 0),
    },
    products,
    customers,
  };
}

function sortedEntries<T>(map: Map<string, T>): [string, T][] {
  return Array.from(map.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}
