export {
  createLogger,
  withCorrelationId,
  generateCorrelationId,
  redactObject,
  logger,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  ValidationError,
  ConfigurationError,
  SourceUnavailableError,
  GraphStoreUnavailableError,
  SourceQueryError,
  RowUpsertError,
  QueryExecutionError,
  ExternalServiceError,
  isOperationalError,
  toSafeErrorResponse,
  toError,
  type SafeErrorDetails,
} from './errors.js';

export { withRetry, sleep, collapseWhitespace, type RetryOptions } from './utils.js';

export {
  loadSyncConfig,
  loadGraphConfig,
  loadApiConfig,
  hasSecret,
  logSecretsStatus,
  type EnvSource,
  type SourceConfig,
  type GraphConfig,
  type TranslatorConfig,
  type SyncConfig,
  type ApiConfig,
} from './env.js';

export {
  createGraphStore,
  withGraphStore,
  Neo4jGraphStore,
  InMemoryGraphStore,
  toGraphValue,
  type GraphQuery,
  type GraphStore,
  type NamedQuery,
  type PatientMatch,
} from './graph/index.js';

export {
  createSourceConnection,
  withSourceConnection,
  isSourceConnectionError,
  toSourceError,
  PostgresSourceConnection,
  SnowflakeSourceConnection,
  type SourceConnection,
  type SourceConnectOptions,
  type SourceResult,
} from './source/index.js';
