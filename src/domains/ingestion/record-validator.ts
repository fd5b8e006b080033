// ──────────────────────────────────────────
// Ingestion: Record validator — raw rows → canonical sales
// ──────────────────────────────────────────

import { RawSaleRecord, RowRejection, Sale, ValidationResult } from '../../shared/types';
import { RowRejected, SchemaError } from '../../shared/errors';
import { toCalendarDate } from '../../shared/dates';

const FIELD_ALIASES = new Map<string, string>([
  ['invoice', 'invoice_id'],
  ['invoice_no', 'invoice_id'],
  ['invoice_number', 'invoice_id'],
  ['payment_method', 'payment'],
  ['price', 'unit_price'],
  ['qty', 'quantity'],
  ['gross_margin_percent', 'gross_margin_percentage'],
  ['gross_margin_pct', 'gross_margin_percentage'],
  ['gross_margin', 'gross_margin_percentage'],
]);

// Column widths of the sales table
const MAX_LENGTH = {
  invoice_id: 50,
  branch: 50,
  city: 100,
  customer_type: 50,
  gender: 20,
  product_line: 100,
  payment: 50,
} as const;
type TextField = Exclude<keyof typeof MAX_LENGTH, 'invoice_id'>;

// Postgres integer
const MAX_QUANTITY = 2_147_483_647;

const TIME = /^([01]?\d|2[0-3]):([0-5]\d)(?::[0-5]\d)?$/;
const UNKNOWN = 'Unknown';

export function normalizeFieldName(name: string): string {
  const key = name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return FIELD_ALIASES.get(key) ?? key;
}

function normalizeRecord(raw: RawSaleRecord): RawSaleRecord {
  const record: RawSaleRecord = {};
  for (const [name, value] of Object.entries(raw)) {
    const key = normalizeFieldName(name);
    // First non-empty spelling of a field wins
    if (Object.hasOwn(record, key) && !isAbsent(record[key])) continue;
    record[key] = value;
  }
  return record;
}

/**
 * Validates and repairs a batch of raw sales rows.
 *
 * Rows are checked independently; a bad row is rejected with a reason and
 * the rest of the batch carries on. Only a batch whose columns cannot
 * describe a sale at all (no invoice id, no date, or no way to get a
 * total) fails as a whole with SchemaError.
 */
export class RecordValidator {
  validate(batch: readonly RawSaleRecord[]): ValidationResult {
    if (batch.length === 0) return { records: [], rejected: [], duplicates: 0 };

    const rows = batch.map(normalizeRecord);
    assertRecognizableSchema(rows);

    const records: Sale[] = [];
    const rejected: RowRejection[] = [];
    const seen = new Set<string>();
    let duplicates = 0;

    rows.forEach((row, index) => {
      try {
        const sale = toSale(row);
        if (seen.has(sale.invoice_id)) {
          duplicates++;
          rejected.push({ row: index, invoice_id: sale.invoice_id, reason: 'duplicate_invoice_id' });
          return;
        }
        seen.add(sale.invoice_id);
        records.push(sale);
      } catch (err) {
        if (!(err instanceof RowRejected)) throw err;
        const rejection: RowRejection = { row: index, invoice_id: invoiceIdOf(row), reason: err.reason };
        if (err.field) rejection.field = err.field;
        rejected.push(rejection);
      }
    });

    return { records, rejected, duplicates };
  }
}

// ── Helpers ──

function assertRecognizableSchema(rows: RawSaleRecord[]): void {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }

  const missing: string[] = [];
  if (!columns.has('invoice_id')) missing.push('invoice_id');
  if (!columns.has('date')) missing.push('date');
  if (!columns.has('total') && !(columns.has('unit_price') && columns.has('quantity'))) {
    missing.push('total or unit_price+quantity');
  }
  if (missing.length > 0) throw new SchemaError(missing);
}

function toSale(row: RawSaleRecord): Sale {
  const invoiceId = invoiceIdOf(row);
  if (!invoiceId) throw new RowRejected('missing_invoice_id', 'invoice_id');
  if (invoiceId.length > MAX_LENGTH.invoice_id) throw new RowRejected('value_too_long', 'invoice_id');

  const date = toCalendarDate(row.date);
  if (!date) throw new RowRejected('invalid_date', 'date');

  const time = toTime(row.time);
  let unitPrice = toNumber(row, 'unit_price');
  let quantity = toNumber(row, 'quantity');
  let total = toNumber(row, 'total');
  let grossMargin = toNumber(row, 'gross_margin_percentage');
  let grossIncome = toNumber(row, 'gross_income');
  let cogs = toNumber(row, 'cogs');
  const rating = toNumber(row, 'rating');

  if (total === undefined) {
    if (unitPrice === undefined || quantity === undefined) throw new RowRejected('missing_amount', 'total');
    total = unitPrice * quantity;
  }

  if (quantity === undefined) quantity = 1;
  if (!Number.isInteger(quantity) || quantity < 1 || quantity > MAX_QUANTITY) {
    throw new RowRejected('invalid_quantity', 'quantity');
  }

  if (unitPrice === undefined) unitPrice = total / quantity;
  if (unitPrice < 0) throw new RowRejected('negative_unit_price', 'unit_price');
  if (total < 0) throw new RowRejected('negative_total', 'total');
  if (rating !== undefined && (rating < 0 || rating > 10)) {
    throw new RowRejected('rating_out_of_range', 'rating');
  }

  if (grossMargin === undefined) {
    grossMargin = grossIncome !== undefined && total > 0 ? (grossIncome / total) * 100 : 0;
  }
  if (grossIncome === undefined) grossIncome = (total * grossMargin) / 100;
  if (cogs === undefined) cogs = total - grossIncome;

  return {
    invoice_id: invoiceId,
    branch: toText(row, 'branch'),
    city: toText(row, 'city'),
    customer_type: toText(row, 'customer_type'),
    gender: toText(row, 'gender'),
    product_line: toText(row, 'product_line'),
    unit_price: unitPrice,
    quantity,
    total,
    date,
    time,
    payment: toText(row, 'payment'),
    cogs,
    gross_margin_percentage: grossMargin,
    gross_income: grossIncome,
    rating: rating ?? null,
  };
}

function isAbsent(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (typeof value === 'number') return Number.isNaN(value);
  return false;
}

function invoiceIdOf(row: RawSaleRecord): string | null {
  const value = row.invoice_id;
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function toText(row: RawSaleRecord, field: TextField): string {
  const value = row[field];
  let text = UNKNOWN;
  if (typeof value === 'string' && value.trim() !== '') text = value.trim();
  else if (typeof value === 'number' && Number.isFinite(value)) text = String(value);

  if (text.length > MAX_LENGTH[field]) throw new RowRejected('value_too_long', field);
  return text;
}

/** undefined when the field is absent; throws when present but not numeric. */
function toNumber(row: RawSaleRecord, field: string): number | undefined {
  const value = row[field];
  if (isAbsent(value)) return undefined;

  let parsed = Number.NaN;
  if (typeof value === 'number') parsed = value;
  else if (typeof value === 'string') parsed = Number(value.trim().replace(/^\$/, '').replace(/,/g, ''));

  if (!Number.isFinite(parsed)) throw new RowRejected('invalid_number', field);
  return parsed;
}

function toTime(value: unknown): string | null {
  if (isAbsent(value)) return null;
  const match = typeof value === 'string' ? TIME.exec(value.trim()) : null;
  if (!match) throw new RowRejected('invalid_time', 'time');
  return `${match[1].padStart(2, '0')}:${match[2]}`;
}
