import OpenAI from 'openai';
import { z } from 'zod';
import {
  AppError,
  ExternalServiceError,
  ValidationError,
  createLogger,
  toError,
  withRetry,
  type Logger,
  type TranslatorConfig,
} from '@clinigraph/core';
import type { QueryTranslator } from '@clinigraph/domain';

const OpenAIQueryTranslatorConfigSchema = z.object({
  apiKey: z.string().min(1, 'API key is required'),
  model: z.string().min(1).optional(),
  baseURL: z.string().url().optional(),
  maxTokens: z.number().int().min(1).max(16000).optional(),
  temperature: z.number().min(0).max(2).optional(),
  retryConfig: z
    .object({
      maxRetries: z.number().int().min(0).max(10),
      baseDelayMs: z.number().int().min(100).max(30000),
    })
    .optional(),
  timeoutMs: z.number().int().min(1000).max(300000).optional(),
});

export interface OpenAIQueryTranslatorConfig {
  apiKey: string;
  model?: string | undefined;
  /** Override for proxies and tests */
  baseURL?: string | undefined;
  maxTokens?: number | undefined;
  temperature?: number | undefined;
  retryConfig?:
    | {
        maxRetries: number;
        baseDelayMs: number;
      }
    | undefined;
  timeoutMs?: number | undefined;
}

const DEFAULT_MODEL = 'gpt-4o-mini';
const DEFAULT_TEMPERATURE = 0.2;
const DEFAULT_TIMEOUT_MS = 60000;
const MAX_QUESTION_LENGTH = 2000;

export const GRAPH_SCHEMA_HINT = `You are generating Cypher for a Neo4j database with this schema:

Node labels and key properties:
- Patient(id, full_name, first_name, last_name, sex, age, zip)
- Encounter(id, start_time, end_time, provider_npi)
- Condition(code, name)
- Medication(code, name)
- Provider(id, name, specialty, state, zip)
- Observation(id, description, value, unit, category, code, obs_datetime)

Relationships:
- (p:Patient)-[:HAS_ENCOUNTER]->(e:Encounter)
- (p:Patient)-[:HAS_CONDITION]->(c:Condition)
- (p:Patient)-[:TAKES_MEDICATION]->(m:Medication)
- (p:Patient)-[:HAS_PROVIDER]->(pr:Provider)
- (p:Patient)-[:HAS_OBSERVATION]->(o:Observation)
- (e:Encounter)-[:HAS_CONDITION]->(c:Condition)
- (e:Encounter)-[:HAS_MEDICATION]->(m:Medication)
- (e:Encounter)-[:HAS_PROVIDER]->(pr:Provider)
- (e:Encounter)-[:HAS_OBSERVATION]->(o:Observation)

Rules:
- Always use the properties shown above.
- Use toLower() in WHERE filters on text.
- Return tabular results with named columns, never whole nodes or paths.
- Read only: no CREATE, MERGE, SET, DELETE or CALL.
- Do not use APOC.
- Return only the Cypher query, with no comments, explanations or markdown.`;

/**
 * Remove markdown fences and a leading "cypher" language tag
 */
export function stripCodeFences(content: string): string {
  const trimmed = content.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }
  let body = trimmed.replace(/^`+/, '').replace(/`+$/, '').trim();
  if (body.toLowerCase().startsWith('cypher')) {
    body = body.slice('cypher'.length).trim();
  }
  return body;
}

function isTransient(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) return true;
  if (error instanceof OpenAI.APIError) {
    return error.status === 429 || (error.status !== undefined && error.status >= 500);
  }
  return false;
}

/**
 * Natural-language question to Cypher through the OpenAI chat API
 */
export class OpenAIQueryTranslator implements QueryTranslator {
  private client: OpenAI;
  private config: OpenAIQueryTranslatorConfig;
  private logger: Logger;

  constructor(config: OpenAIQueryTranslatorConfig, logger?: Logger) {
    const validatedConfig = OpenAIQueryTranslatorConfigSchema.parse(config);
    this.config = validatedConfig;
    this.logger = logger ?? createLogger({ name: 'openai-query-translator' });
    // Retries go through withRetry so they are logged
    this.client = new OpenAI({
      apiKey: validatedConfig.apiKey,
      baseURL: validatedConfig.baseURL,
      timeout: validatedConfig.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 0,
    });
  }

  async translate(question: string): Promise<string> {
    const trimmed = question.trim();
    if (trimmed === '') {
      throw new ValidationError('Question is empty');
    }
    if (trimmed.length > MAX_QUESTION_LENGTH) {
      throw new ValidationError(`Question is longer than ${MAX_QUESTION_LENGTH} characters`);
    }

    const model = this.config.model ?? DEFAULT_MODEL;
    const prompt = [
      GRAPH_SCHEMA_HINT,
      '',
      'User question:',
      `"""${trimmed}"""`,
      '',
      'Respond with a single valid Cypher query only. Do not wrap it in ``` or any other markdown.',
    ].join('\n');

    const makeRequest = async () => {
      const response = await this.client.chat.completions.create({
        model,
        messages: [
          { role: 'system', content: 'You are an expert Neo4j Cypher generator.' },
          { role: 'user', content: prompt },
        ],
        temperature: this.config.temperature ?? DEFAULT_TEMPERATURE,
        ...(this.config.maxTokens !== undefined && { max_tokens: this.config.maxTokens }),
      });

      const cypher = stripCodeFences(response.choices[0]?.message.content ?? '');
      if (cypher === '') {
        throw new ExternalServiceError('OpenAI', 'Empty response from API');
      }
      return cypher;
    };

    try {
      const cypher = await withRetry(makeRequest, {
        maxRetries: this.config.retryConfig?.maxRetries ?? 2,
        baseDelayMs: this.config.retryConfig?.baseDelayMs ?? 1000,
        shouldRetry: isTransient,
        logger: this.logger,
      });
      this.logger.debug({ model, cypherLength: cypher.length }, 'Question translated');
      return cypher;
    } catch (error) {
      if (error instanceof AppError) throw error;
      const cause = toError(error);
      throw new ExternalServiceError('OpenAI', cause.message, cause);
    }
  }
}

/**
 * Translator for the configured key, or null when translation is disabled
 */
export function createOpenAIQueryTranslator(
  config: TranslatorConfig | null,
  logger?: Logger
): OpenAIQueryTranslator | null {
  if (!config) return null;
  return new OpenAIQueryTranslator({ apiKey: config.apiKey, model: config.model }, logger);
}
