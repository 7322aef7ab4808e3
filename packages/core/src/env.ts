import { z } from 'zod';

import { ConfigurationError } from './errors.js';

/**
 * Environment Variable Validation
 * Every connection parameter is checked before a connection is attempted
 */

export type EnvSource = Record<string, string | undefined>;

// Blank values count as missing
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const required = (name: string) =>
  z.preprocess(blankToUndefined, z.string({ required_error: `${name} is required` }).min(1));

const optional = () => z.preprocess(blankToUndefined, z.string().optional());

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

// Base server config
const ServerEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  PORT: positiveInt(3000),
  HOST: z.preprocess(blankToUndefined, z.string().default('0.0.0.0')),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  CORS_ORIGIN: optional(),
});

const SourceDriverSchema = z.preprocess(
  blankToUndefined,
  z.enum(['snowflake', 'postgres']).default('snowflake')
);

// Snowflake warehouse (username/password plus one-time passcode)
const SnowflakeEnvSchema = z.object({
  SNOWFLAKE_ACCOUNT: required('SNOWFLAKE_ACCOUNT'),
  SNOWFLAKE_USER: required('SNOWFLAKE_USER'),
  SNOWFLAKE_PASSWORD: required('SNOWFLAKE_PASSWORD'),
  SNOWFLAKE_WAREHOUSE: required('SNOWFLAKE_WAREHOUSE'),
  SNOWFLAKE_DATABASE: required('SNOWFLAKE_DATABASE'),
  SNOWFLAKE_SCHEMA: required('SNOWFLAKE_SCHEMA'),
  SNOWFLAKE_ROLE: optional(),
});

// Postgres-compatible warehouse
const PostgresSourceEnvSchema = z.object({
  SOURCE_DATABASE_URL: required('SOURCE_DATABASE_URL'),
});

const GraphEnvSchema = z.object({
  NEO4J_URI: required('NEO4J_URI'),
  NEO4J_USER: required('NEO4J_USER'),
  NEO4J_PASSWORD: required('NEO4J_PASSWORD'),
  NEO4J_DATABASE: z.preprocess(blankToUndefined, z.string().default('neo4j')),
});

const SyncEnvSchema = z.object({
  MAX_ROWS_PER_ENTITY: positiveInt(7000),
  /** Qualifier prepended to every view name, e.g. MEDIGRAPH.PUBLIC */
  SOURCE_NAMESPACE: z.preprocess(
    blankToUndefined,
    z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_$]*(\.[A-Za-z_][A-Za-z0-9_$]*)?$/, 'Invalid namespace')
      .optional()
  ),
  SOURCE_PASSCODE: optional(),
});

// OpenAI text-to-Cypher translator (optional)
const TranslatorEnvSchema = z.object({
  OPENAI_API_KEY: optional(),
  OPENAI_MODEL: z.preprocess(blankToUndefined, z.string().default('gpt-4o-mini')),
});

export type SourceConfig =
  | {
      driver: 'snowflake';
      account: string;
      username: string;
      password: string;
      warehouse: string;
      database: string;
      schema: string;
      role: string | undefined;
    }
  | {
      driver: 'postgres';
      connectionString: string;
    };

export interface GraphConfig {
  uri: string;
  username: string;
  password: string;
  database: string;
}

export interface TranslatorConfig {
  apiKey: string;
  model: string;
}

export interface SyncConfig {
  source: SourceConfig;
  graph: GraphConfig;
  maxRowsPerEntity: number;
  namespace: string | undefined;
  /** Passcode supplied through the environment instead of the prompt */
  passcode: string | undefined;
}

export interface ApiConfig {
  env: z.infer<typeof ServerEnvSchema>['NODE_ENV'];
  logLevel: z.infer<typeof ServerEnvSchema>['LOG_LEVEL'];
  server: { port: number; host: string };
  /** Comma-separated allowed origins, unset disables CORS */
  corsOrigin: string | undefined;
  graph: GraphConfig;
  translator: TranslatorConfig | null;
}

/**
 * Collects issues across sections so one error names every missing key
 */
class EnvReader {
  private readonly issues: string[] = [];
  private readonly keys = new Set<string>();

  constructor(private readonly env: EnvSource) {}

  read<T extends z.ZodTypeAny>(schema: T): z.infer<T> | undefined {
    const result = schema.safeParse(this.env);
    if (result.success) {
      return result.data;
    }
    for (const issue of result.error.issues) {
      const key = issue.path.join('.');
      this.keys.add(key);
      this.issues.push(`  ${key}: ${issue.message}`);
    }
    return undefined;
  }

  assertValid(): void {
    if (this.issues.length > 0) {
      throw new ConfigurationError(
        `Environment validation failed:\n${this.issues.join('\n')}`,
        [...this.keys]
      );
    }
  }
}

function readSource(reader: EnvReader, env: EnvSource): SourceConfig | undefined {
  const driver = SourceDriverSchema.safeParse(env.SOURCE_DRIVER);
  if (!driver.success) {
    reader.read(z.object({ SOURCE_DRIVER: SourceDriverSchema }));
    return undefined;
  }

  if (driver.data === 'postgres') {
    const pg = reader.read(PostgresSourceEnvSchema);
    return pg ? { driver: 'postgres', connectionString: pg.SOURCE_DATABASE_URL } : undefined;
  }

  const sf = reader.read(SnowflakeEnvSchema);
  return sf
    ? {
        driver: 'snowflake',
        account: sf.SNOWFLAKE_ACCOUNT,
        username: sf.SNOWFLAKE_USER,
        password: sf.SNOWFLAKE_PASSWORD,
        warehouse: sf.SNOWFLAKE_WAREHOUSE,
        database: sf.SNOWFLAKE_DATABASE,
        schema: sf.SNOWFLAKE_SCHEMA,
        role: sf.SNOWFLAKE_ROLE,
      }
    : undefined;
}

function readGraph(reader: EnvReader): GraphConfig | undefined {
  const graph = reader.read(GraphEnvSchema);
  return graph
    ? {
        uri: graph.NEO4J_URI,
        username: graph.NEO4J_USER,
        password: graph.NEO4J_PASSWORD,
        database: graph.NEO4J_DATABASE,
      }
    : undefined;
}

/**
 * Graph store settings only (health checks, question answering)
 */
export function loadGraphConfig(env: EnvSource = process.env): GraphConfig {
  const reader = new EnvReader(env);
  const graph = readGraph(reader);
  reader.assertValid();
  if (!graph) {
    throw new ConfigurationError('Graph store configuration is incomplete');
  }
  return graph;
}

/**
 * Everything the batch job needs: source, graph store and batch limits
 */
export function loadSyncConfig(env: EnvSource = process.env): SyncConfig {
  const reader = new EnvReader(env);
  const source = readSource(reader, env);
  const graph = readGraph(reader);
  const sync = reader.read(SyncEnvSchema);
  reader.assertValid();

  if (!source || !graph || !sync) {
    throw new ConfigurationError('Sync configuration is incomplete');
  }

  return {
    source,
    graph,
    maxRowsPerEntity: sync.MAX_ROWS_PER_ENTITY,
    namespace: sync.SOURCE_NAMESPACE,
    passcode: sync.SOURCE_PASSCODE,
  };
}

/**
 * HTTP server settings; the translator is enabled only when an API key is present
 */
export function loadApiConfig(env: EnvSource = process.env): ApiConfig {
  const reader = new EnvReader(env);
  const server = reader.read(ServerEnvSchema);
  const graph = readGraph(reader);
  const translator = reader.read(TranslatorEnvSchema);
  reader.assertValid();

  if (!server || !graph || !translator) {
    throw new ConfigurationError('API configuration is incomplete');
  }

  return {
    env: server.NODE_ENV,
    logLevel: server.LOG_LEVEL,
    server: { port: server.PORT, host: server.HOST },
    corsOrigin: server.CORS_ORIGIN,
    graph,
    translator: translator.OPENAI_API_KEY
      ? { apiKey: translator.OPENAI_API_KEY, model: translator.OPENAI_MODEL }
      : null,
  };
}

/**
 * Check if a specific secret is configured
 */
export function hasSecret(name: string, env: EnvSource = process.env): boolean {
  const value = env[name];
  return value !== undefined && value.trim() !== '';
}

/**
 * Log secrets status (without revealing values)
 */
export function logSecretsStatus(
  logger: { info: (obj: object, msg: string) => void },
  env: EnvSource = process.env
): void {
  const secrets = ['SNOWFLAKE_PASSWORD', 'SOURCE_DATABASE_URL', 'NEO4J_PASSWORD', 'OPENAI_API_KEY'];

  const status = secrets.reduce<Record<string, string>>((acc, name) => {
    acc[name] = hasSecret(name, env) ? 'configured' : 'missing';
    return acc;
  }, {});

  logger.info(status, 'Secrets status');
}
