export {
  INTENT_TABLE,
  HELP_TEXT,
  NO_DATA_MESSAGE,
  DEFAULT_CONDITION_TERM,
  needsPatientMessage,
  type IntentEntry,
} from './intents.js';
export {
  buildConditionQuery,
  buildPatientQuery,
  patientMatchFor,
} from './query-shapes.js';
export { QueryRouter, routeQuestion, normalizeQuestion, type RouteDecision } from './query-router.js';
export { project, columnsOf } from './result-projector.js';
export {
  TranslatedQuestionService,
  assertReadOnly,
  type QueryTranslator,
} from './translated-question-service.js';
