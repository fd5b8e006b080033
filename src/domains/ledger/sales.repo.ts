// ──────────────────────────────────────────
// Ledger: Sales repository (Postgres)
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { SalesLedger } from '../../shared/contracts';
import { DateScope, Sale } from '../../shared/types';
import { LedgerError, errorMessage } from '../../shared/errors';

const TABLE = 'sales';
const INSERT_CHUNK = 500;

interface SaleRow {
  invoice_id: string;
  branch: string;
  city: string;
  customer_type: string;
  gender: string;
  product_line: string;
  unit_price: number | string;
  quantity: number | string;
  total: number | string;
  date: string;
  time: string | null;
  payment: string;
  cogs: number | string;
  gross_margin_percentage: number | string;
  gross_income: number | string;
  rating: number | string | null;
}

export class SalesRepo implements SalesLedger {
  constructor(private db: Knex) {}

  async query(scope: DateScope): Promise<Sale[]> {
    try {
      let query = this.db(TABLE)
        .select(
          'invoice_id',
          'branch',
          'city',
          'customer_type',
          'gender',
          'product_line',
          'unit_price',
          'quantity',
          'total',
          this.db.raw(`to_char("date", 'YYYY-MM-DD') as "date"`),
          'time',
          'payment',
          'cogs',
          'gross_margin_percentage',
          'gross_income',
          'rating'
        )
        .orderBy([{ column: 'date' }, { column: 'invoice_id' }]);

      if (scope.start) query = query.where('date', '>=', scope.start);
      if (scope.end) query = query.where('date', '<=', scope.end);

      const rows: SaleRow[] = await query;
      return rows.map(toSale);
    } catch (err) {
      throw new LedgerError(`Failed to query sales: ${errorMessage(err)}`, err);
    }
  }

  async bulkInsert(records: Sale[]): Promise<number> {
    if (records.length === 0) return 0;

    try {
      await this.db.transaction(async (trx) => {
        for (let i = 0; i < records.length; i += INSERT_CHUNK) {
          await trx(TABLE).insert(records.slice(i, i + INSERT_CHUNK));
        }
      });
    } catch (err) {
      throw new LedgerError(`Bulk insert of ${records.length} sales rolled back: ${errorMessage(err)}`, err);
    }

    console.log(`[SalesRepo] Inserted ${records.length} sales`);
    return records.length;
  }
}

// pg returns numeric columns as strings
function toSale(row: SaleRow): Sale {
  return {
    invoice_id: row.invoice_id,
    branch: row.branch,
    city: row.city,
    customer_type: row.customer_type,
    gender: row.gender,
    product_line: row.product_line,
    unit_price: Number(row.unit_price),
    quantity: Number(row.quantity),
    total: Number(row.total),
    date: row.date,
    time: row.time,
    payment: row.payment,
    cogs: Number(row.cogs),
    gross_margin_percentage: Number(row.gross_margin_percentage),
    gross_income: Number(row.gross_income),
    rating: row.rating === null ? null : Number(row.rating),
  };
}
