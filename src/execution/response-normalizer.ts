import type { RequestStyle } from '../capabilities/request-styles.js';
import { ErrorKind, fail, ok } from '../error-handling/error-kinds.js';
import type { Outcome } from '../error-handling/error-kinds.js';
import type { JsonObject } from '../spec/types.js';
import { listCodecs, resolveCodec } from '../translation/codec-registry.js';
import type { NormalizedResponse } from '../translation/types.js';

/**
 * Normalizes a provider response body. The preferred codec is tried first,
 * then every other codec in registry order.
 */
export function normalizeResponse(body: string, preferred?: RequestStyle): Outcome<NormalizedResponse> {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail(ErrorKind.JsonError, `Provider response is not valid JSON: ${reason}`);
  }
  const codecs = preferred
    ? [resolveCodec(preferred), ...listCodecs().filter((codec) => codec.id !== preferred)]
    : listCodecs();
  for (const codec of codecs) {
    const normalized = codec.normalizeResponse(payload);
    if (normalized) {
      return ok(normalized);
    }
  }
  return fail(ErrorKind.InvalidInput, 'Provider response is not a recognized chat completion shape');
}

export function toNormalizedResponseJson(response: NormalizedResponse): JsonObject {
  return {
    content: response.content,
    role: response.role,
    finish_reason: response.finishReason,
    usage: response.usage
      ? {
          input_tokens: response.usage.inputTokens,
          output_tokens: response.usage.outputTokens,
          total_tokens: response.usage.totalTokens
        }
      : null,
    model: response.model,
    id: response.id
  };
}
