/**
 * Wire form of translation results and provider requests (snake_case JSON).
 * `run` reads back what `translate` writes.
 */

import { z } from 'zod';

import { ErrorKind, fail, ok } from '../error-handling/error-kinds.js';
import type { Outcome } from '../error-handling/error-kinds.js';
import { formatJsonPath } from '../spec/parser.js';
import { jsonValueSchema } from '../spec/spec-schemas.js';
import { ENDPOINT_CAPABILITIES } from '../spec/types.js';
import type { JsonObject } from '../spec/types.js';
import { isPlainObject } from '../utils/json-guards.js';
import type { ProviderRequest, TranslationDiagnostic, TranslationResult } from './types.js';

const providerRequestDecoder = z
  .object({
    provider: z.string().min(1),
    model: z.string().min(1),
    endpoint: z.object({
      capability: z.enum(ENDPOINT_CAPABILITIES).default('chat_completion'),
      method: z.string().min(1).default('POST'),
      path: z.string().default(''),
      protocol: z.string().min(1).default('https'),
      url: z.string().min(1)
    }),
    headers: z.record(z.string()).default({}),
    auth: z
      .object({
        header: z.string().min(1),
        scheme: z.string().min(1).optional(),
        value_template: z.string().min(1)
      })
      .optional(),
    body: z.record(jsonValueSchema)
  })
  .transform(
    (wire): ProviderRequest => ({
      provider: wire.provider,
      model: wire.model,
      endpoint: wire.endpoint,
      headers: wire.headers,
      auth: wire.auth
        ? { header: wire.auth.header, scheme: wire.auth.scheme, valueTemplate: wire.auth.value_template }
        : undefined,
      body: wire.body
    })
  );

/** Accepts a full translation result (`{ request: ... }`) or a bare request. */
export function decodeProviderRequest(value: unknown): Outcome<ProviderRequest> {
  const isWrapped = isPlainObject(value) && isPlainObject(value.request);
  const candidate = isPlainObject(value) && isWrapped ? value.request : value;
  const parsed = providerRequestDecoder.safeParse(candidate);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const path = isWrapped ? ['request', ...issue.path] : issue.path;
    return fail(ErrorKind.InvalidInput, `Invalid provider request at ${formatJsonPath(path)}: ${issue.message}`);
  }
  return ok(parsed.data);
}

export function toProviderRequestJson(request: ProviderRequest): JsonObject {
  const json: JsonObject = {
    provider: request.provider,
    model: request.model,
    endpoint: { ...request.endpoint },
    headers: { ...request.headers }
  };
  if (request.auth) {
    const auth: JsonObject = { header: request.auth.header };
    if (request.auth.scheme !== undefined) {
      auth.scheme = request.auth.scheme;
    }
    auth.value_template = request.auth.valueTemplate;
    json.auth = auth;
  }
  json.body = request.body;
  return json;
}

export function toTranslationResultJson(result: TranslationResult): JsonObject {
  return {
    mode: result.mode,
    request: toProviderRequestJson(result.request),
    diagnostics: result.diagnostics.map(toDiagnosticJson)
  };
}

function toDiagnosticJson(diagnostic: TranslationDiagnostic): JsonObject {
  const json: JsonObject = {
    feature: diagnostic.feature,
    action: diagnostic.action,
    path: diagnostic.path,
    message: diagnostic.message
  };
  if (diagnostic.original !== undefined) {
    json.original = diagnostic.original;
  }
  if (diagnostic.clamped !== undefined) {
    json.clamped = diagnostic.clamped;
  }
  return json;
}
