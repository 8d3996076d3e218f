import { describe, expect, it } from '@jest/globals';

import { ErrorKind, unwrapOutcome } from '../../src/error-handling/error-kinds.js';
import { normalizeResponse, toNormalizedResponseJson } from '../../src/execution/response-normalizer.js';

describe('normalizeResponse', () => {
  it('detects the response shape without a hint', () => {
    const body = JSON.stringify({ type: 'message', role: 'assistant', content: [{ type: 'text', text: 'ok' }] });
    const normalized = unwrapOutcome(normalizeResponse(body));
    expect(normalized.content).toBe('ok');
    expect(normalized.finishReason).toBeNull();
  });

  it('renders the snake_case document', () => {
    const body = JSON.stringify({
      id: 'r1',
      choices: [{ message: { content: 'hi' }, finish_reason: 'length' }],
      usage: { prompt_tokens: 3, completion_tokens: 4 }
    });
    expect(toNormalizedResponseJson(unwrapOutcome(normalizeResponse(body, 'openai')))).toEqual({
      content: 'hi',
      role: 'assistant',
      finish_reason: 'length',
      usage: { input_tokens: 3, output_tokens: 4, total_tokens: 7 },
      model: null,
      id: 'r1'
    });
  });

  it('reports invalid and unrecognized bodies', () => {
    const invalid = normalizeResponse('{"choices":');
    expect(invalid.ok).toBe(false);
    expect(invalid.kind).toBe(ErrorKind.JsonError);

    expect(normalizeResponse('{"status":"done"}', 'gemini')).toEqual({
      ok: false,
      kind: ErrorKind.InvalidInput,
      message: 'Provider response is not a recognized chat completion shape'
    });
  });
});
