// ──────────────────────────────────────────
// Shared error taxonomy
// ──────────────────────────────────────────

import { RejectionReason } from './types';

export type ErrorCode =
  | 'SCHEMA_ERROR'
  | 'AGGREGATION_ERROR'
  | 'LEDGER_ERROR'
  | 'CACHE_UNAVAILABLE'
  | 'INTERNAL_ERROR';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  SCHEMA_ERROR: 400,
  AGGREGATION_ERROR: 400,
  LEDGER_ERROR: 502,
  CACHE_UNAVAILABLE: 503,
  INTERNAL_ERROR: 500,
};

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly httpStatus: number;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.httpStatus = STATUS_BY_CODE[code];
  }
}

/** Batch has none of the columns a sale needs; nothing in it can be ingested. */
export class SchemaError extends AppError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super('SCHEMA_ERROR', `Unrecognized sales schema, missing columns: ${missing.join(', ')}`);
    this.name = 'SchemaError';
    this.missing = missing;
  }
}

/** One record failed validation. Caught per row and reported, never surfaced. */
export class RowRejected extends Error {
  readonly reason: RejectionReason;
  readonly field?: string;

  constructor(reason: RejectionReason, field?: string) {
    super(field ? `${reason}: ${field}` : reason);
    this.name = 'RowRejected';
    this.reason = reason;
    this.field = field;
  }
}

export class AggregationError extends AppError {
  constructor(message: string) {
    super('AGGREGATION_ERROR', message);
    this.name = 'AggregationError';
  }
}

export class LedgerError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('LEDGER_ERROR', message, { cause });
    this.name = 'LedgerError';
  }
}

// Only ever logged: the cache fails open
export class CacheUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('CACHE_UNAVAILABLE', message, { cause });
    this.name = 'CacheUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function statusForError(err: unknown): { status: number; code: ErrorCode; message: string } {
  if (err instanceof AppError) {
    return { status: err.httpStatus, code: err.code, message: err.message };
  }
  return { status: 500, code: 'INTERNAL_ERROR', message: errorMessage(err) };
}
