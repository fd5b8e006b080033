import {
  AggregationError,
  AppError,
  CacheUnavailableError,
  LedgerError,
  SchemaError,
  statusForError,
} from '../src/shared/errors';

describe('statusForError', () => {
  it.each<[AppError, number]>([
    [new SchemaError(['invoice_id']), 400],
    [new AggregationError('bad range'), 400],
    [new LedgerError('connection refused'), 502],
    [new CacheUnavailableError('down'), 503],
  ])('should map %s to HTTP %i', (err, status) => {
    expect(statusForError(err)).toEqual({ status, code: err.code, message: err.message });
  });

  it('should report anything else as an internal error', () => {
    expect(statusForError(new TypeError('boom'))).toEqual({
      status: 500,
      code: 'INTERNAL_ERROR',
      message: 'boom',
    });
    expect(statusForError('plain string')).toEqual({
      status: 500,
      code: 'INTERNAL_ERROR',
      message: 'plain string',
    });
  });
});

describe('SchemaError', () => {
  it('should list the missing columns', () => {
    const err = new SchemaError(['invoice_id', 'date']);

    expect(err.message).toBe('Unrecognized sales schema, missing columns: invoice_id, date');
    expect(err.missing).toEqual(['invoice_id', 'date']);
    expect(err).toBeInstanceOf(AppError);
  });
});

describe('LedgerError', () => {
  it('should keep the driver error as its cause', () => {
    const cause = new Error('ECONNREFUSED');
    expect(new LedgerError('Failed to insert sales', cause).cause).toBe(cause);
  });
});
