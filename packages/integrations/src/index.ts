/**
 * @clinigraph/integrations
 *
 * Third-party service clients. The OpenAI translator turns free-form
 * questions into read-only Cypher for the translated question mode.
 */

export {
  OpenAIQueryTranslator,
  createOpenAIQueryTranslator,
  stripCodeFences,
  GRAPH_SCHEMA_HINT,
  type OpenAIQueryTranslatorConfig,
} from './openai-query-translator.js';
