import { SalesLedger } from '../../src/shared/contracts';
import { DateScope, Sale } from '../../src/shared/types';
import { LedgerError } from '../../src/shared/errors';

/** In-process stand-in for the Postgres sales repository. */
export class MemorySalesLedger implements SalesLedger {
  readonly sales: Sale[] = [];

  constructor(initial: Sale[] = []) {
    this.sales.push(...initial);
  }

  async query(scope: DateScope): Promise<Sale[]> {
    return this.sales.filter(
      (s) => (scope.start === null || s.date >= scope.start) && (scope.end === null || s.date <= scope.end)
    );
  }

  async bulkInsert(records: Sale[]): Promise<number> {
    const existing = new Set(this.sales.map((s) => s.invoice_id));
    const clash = records.find((r) => existing.has(r.invoice_id));
    if (clash) {
      throw new LedgerError(`duplicate key value violates unique constraint (invoice_id=${clash.invoice_id})`);
    }
    this.sales.push(...records);
    return records.length;
  }
}

export function makeSale(overrides: Partial<Sale> & Pick<Sale, 'invoice_id' | 'date'>): Sale {
  const unitPrice = overrides.unit_price ?? 10;
  const quantity = overrides.quantity ?? 1;
  const total = overrides.total ?? unitPrice * quantity;
  return {
    branch: 'A',
    city: 'Yangon',
    customer_type: 'Member',
    gender: 'Female',
    product_line: 'Food and beverages',
    time: null,
    payment: 'Cash',
    cogs: total,
    gross_margin_percentage: 0,
    gross_income: 0,
    rating: null,
    ...overrides,
    unit_price: unitPrice,
    quantity,
    total,
  };
}
