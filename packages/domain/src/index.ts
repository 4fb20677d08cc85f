// ─── Table ────────────────────────────────────────────────────────────────────
export * from './table/tabular-table.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors/pipeline-errors.js';

// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/vehicle-record.js';
export * from './entities/actor-record.js';
export * from './entities/actor-type.js';
export * from './entities/validation-result.js';
export * from './entities/evaluation-result.js';
export * from './entities/stored-run.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/run-evaluation.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/run-store.port.js';
export * from './ports/outbound/tabular-decoder.port.js';
export * from './ports/outbound/archive-reader.port.js';
