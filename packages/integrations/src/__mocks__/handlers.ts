import { http, HttpResponse } from 'msw';

/**
 * MSW Handlers for External Service Mocks
 * Used in tests to mock the OpenAI chat completions API
 */

export const OPENAI_CHAT_URL = 'https://api.openai.com/v1/chat/completions';

export function chatCompletion(content: string | null, model = 'gpt-4o-mini') {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 1717200000,
    model,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content },
        finish_reason: 'stop',
        logprobs: null,
      },
    ],
    usage: { prompt_tokens: 120, completion_tokens: 24, total_tokens: 144 },
  };
}

// =============================================================================
// OpenAI API Mocks
// =============================================================================

const openaiHandlers = [
  http.post(OPENAI_CHAT_URL, () => {
    return HttpResponse.json(
      chatCompletion('MATCH (p:Patient) RETURN p.id AS patient_id LIMIT 10')
    );
  }),
];

/**
 * Creates a handler that fails N times then answers with `content`
 */
export function createFailingHandler(failCount: number, errorStatus: number, content: string) {
  let callCount = 0;
  return http.post(OPENAI_CHAT_URL, () => {
    callCount++;
    if (callCount <= failCount) {
      return HttpResponse.json(
        { error: { message: 'Upstream unavailable', type: 'server_error', code: null } },
        { status: errorStatus }
      );
    }
    return HttpResponse.json(chatCompletion(content));
  });
}

export const handlers = [...openaiHandlers];
