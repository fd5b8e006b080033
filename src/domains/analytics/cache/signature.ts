// ──────────────────────────────────────────
// Analytics: Query signatures — deterministic cache keys
// ──────────────────────────────────────────

import { AnalysisKind, DateScope, Interval, QuerySignature } from '../../../shared/types';

const PREFIX = 'sales';

export function analysisSignature(kind: AnalysisKind, scope: DateScope, interval: Interval | null = null): QuerySignature {
  return { kind, start: scope.start, end: scope.end, interval };
}

/** Ingestion results are keyed by the caller's batch key rather than a date range. */
export function ingestionSignature(batchKey: string): QuerySignature {
  return { kind: 'ingestion', start: null, end: null, interval: null, batch_key: batchKey };
}

export function signatureKey(signature: QuerySignature): string {
  if (signature.kind === 'ingestion') {
    return `${PREFIX}:ingestion:${signature.batch_key ?? ''}`;
  }
  return [
    PREFIX,
    signature.kind,
    signature.start ?? '*',
    signature.end ?? '*',
    signature.interval ?? '-',
  ].join(':');
}
