/**
 * MSW Test Utilities
 *
 * Lifecycle management (beforeAll/afterEach/afterAll) is handled by vitest.setup.ts.
 * Tests override handlers per case:
 * ```typescript
 * server.use(http.post(OPENAI_CHAT_URL, () => HttpResponse.json(chatCompletion('MATCH ...'))));
 * ```
 */

export { server } from './server.js';
export { handlers, chatCompletion, createFailingHandler, OPENAI_CHAT_URL } from './handlers.js';
