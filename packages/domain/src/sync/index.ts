export {
  Extractor,
  buildExtractStatement,
  SOURCE_VIEWS,
  DEFAULT_MAX_ROWS,
  type ExtractorOptions,
} from './extractor.js';
export { LoadStateGate, type LoadDecision } from './load-state-gate.js';
export { GraphLoader, PROGRESS_INTERVAL, type BatchLoadResult } from './graph-loader.js';
export {
  planRow,
  planProvider,
  planPatient,
  planEncounter,
  planCondition,
  planMedication,
  planObservation,
  fullNameOf,
  type RowPlan,
} from './upsert-plans.js';
export { runGraphSync, type GraphSyncOptions } from './pipeline.js';
