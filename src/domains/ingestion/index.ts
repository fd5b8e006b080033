// ──────────────────────────────────────────
// Ingestion domain — barrel export
// ──────────────────────────────────────────

export { RecordValidator, normalizeFieldName } from './record-validator';
export { IngestionService } from './ingestion.service';
export { createIngestionRoutes } from './routes';
