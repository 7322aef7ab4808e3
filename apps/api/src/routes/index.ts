export { createHealthRoutes, type HealthRouteDependencies } from './health.js';
export { createQuestionRoutes, type QuestionRouteDependencies } from './questions.js';
