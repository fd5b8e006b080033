// ──────────────────────────────────────────
// Ingestion: Core service — the single funnel
// ──────────────────────────────────────────

import { v4 as uuidv4 } from 'uuid';
import { SalesLedger } from '../../shared/contracts';
import { IngestionReport, RawSaleRecord } from '../../shared/types';
import { ingestionReportSchema } from '../../shared/schemas';
import { QueryCache } from '../analytics/cache/query-cache';
import { ingestionSignature } from '../analytics/cache/signature';
import { RecordValidator } from './record-validator';

export interface IngestOptions {
  /** Replaying a batch under the same key returns the first report instead of re-inserting. */
  batchKey?: string;
}

export class IngestionService {
  constructor(
    private ledger: SalesLedger,
    private cache: QueryCache,
    private validator: RecordValidator = new RecordValidator()
  ) {}

  async ingest(records: RawSaleRecord[], options: IngestOptions = {}): Promise<IngestionReport> {
    if (!options.batchKey) return this.validateAndStore(records);

    return this.cache.getOrCompute(
      ingestionSignature(options.batchKey),
      ingestionReportSchema,
      () => this.validateAndStore(records)
    );
  }

  private async validateAndStore(records: RawSaleRecord[]): Promise<IngestionReport> {
    const batchId = uuidv4();

    // 1. Validate the whole batch before touching the ledger
    const { records: sales, rejected, duplicates } = this.validator.validate(records);

    // 2. Single transactional write
    const inserted = await this.ledger.bulkInsert(sales);

    console.log(
      `[Ingestion] Batch ${batchId}: ${sales.length} accepted, ${rejected.length - duplicates} rejected, ${duplicates} duplicates`
    );

    return {
      batch_id: batchId,
      received: records.length,
      accepted: sales.length,
      duplicates,
      inserted,
      rejected,
    };
  }
}
