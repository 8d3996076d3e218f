/**
 * Translator - prompt spec + 模型能力 -> provider 请求
 *
 * strict: any unsupported required feature fails the translation.
 * standard: each unsupported feature degrades through its policy and is
 * reported exactly once, in feature evaluation order. Sampling values outside
 * a model's declared range are clamped afterwards.
 */

import { FEATURES } from '../capabilities/features.js';
import type { Feature } from '../capabilities/features.js';
import type { ModelCapabilities } from '../capabilities/capability-resolver.js';
import { CONTENT_TYPES, HTTP_HEADERS } from '../constants/index.js';
import { ErrorKind, fail, ok } from '../error-handling/error-kinds.js';
import type { Outcome } from '../error-handling/error-kinds.js';
import type { UnifiedLogger } from '../logging/index.js';
import type { EndpointCapability, EndpointSpec, PromptSpec, ProviderInfo } from '../spec/types.js';
import { resolveCodec } from './codec-registry.js';
import { FEATURE_POLICIES, requiredFeatures } from './feature-policy.js';
import type { TranslationDraft } from './feature-policy.js';
import { applyClamps, findRangeViolations, formatRange } from './parameter-ranges.js';
import type { RangeViolation } from './parameter-ranges.js';
import { applyFieldMappings } from './request-mappings.js';
import type { AuthTemplate, ResolvedEndpoint, TranslationDiagnostic, TranslationMode, TranslationResult } from './types.js';

export function translatePrompt(
  prompt: PromptSpec,
  capabilities: ModelCapabilities,
  mode: TranslationMode,
  logger?: UnifiedLogger
): Outcome<TranslationResult> {
  if (prompt.messages.length === 0) {
    return fail(ErrorKind.InvalidInput, 'Prompt spec must contain at least one message');
  }

  const missing = missingFeatures(requiredFeatures(prompt), capabilities.supported);
  if (mode === 'strict') {
    const violations = findRangeViolations(prompt, capabilities.parameterRanges);
    if (missing.length > 0) {
      const names = [...missing].sort().join(', ');
      return fail(
        ErrorKind.NotImplemented,
        `Capability mismatch for model '${capabilities.modelId}': missing features [${names}]`
      );
    }
    if (violations.length > 0) {
      const details = violations
        .map((violation) => `${violation.parameter} ${violation.value} outside ${formatRange(violation.range)}`)
        .join(', ');
      return fail(ErrorKind.NotImplemented, `Capability mismatch for model '${capabilities.modelId}': ${details}`);
    }
  }

  let draft: TranslationDraft = {
    prompt,
    endpoint: prompt.stream ? 'streaming_chat_completion' : 'chat_completion',
    singleText: !capabilities.supported.has('messages')
  };
  const diagnostics: TranslationDiagnostic[] = [];
  for (const feature of FEATURES) {
    if (capabilities.supported.has(feature)) {
      continue;
    }
    const policy = FEATURE_POLICIES[feature];
    if (!missing.includes(feature) && !policy.isRequired(draft.prompt)) {
      continue;
    }
    const diagnostic: TranslationDiagnostic = {
      feature,
      action: policy.action,
      path: policy.path,
      message: policy.describe(draft, capabilities.modelId)
    };
    diagnostics.push(diagnostic);
    logger?.debug('Applied capability fallback', diagnostic);
    draft = policy.apply(draft);
  }

  const violations = findRangeViolations(draft.prompt, capabilities.parameterRanges);
  for (const violation of violations) {
    const diagnostic = clampDiagnostic(violation, capabilities.modelId);
    diagnostics.push(diagnostic);
    logger?.debug('Clamped sampling parameter', diagnostic);
  }
  draft = { ...draft, prompt: applyClamps(draft.prompt, violations) };

  const endpointSpec = capabilities.endpoints[draft.endpoint];
  if (!endpointSpec) {
    return fail(
      ErrorKind.InternalError,
      `Model '${capabilities.modelId}' has no ${draft.endpoint} endpoint after applying fallbacks`
    );
  }

  const codec = resolveCodec(capabilities.requestStyle);
  const encoded = codec.encodeRequest(draft.prompt, {
    modelId: capabilities.modelId,
    stream: draft.endpoint === 'streaming_chat_completion'
  });

  return ok({
    mode,
    request: {
      provider: capabilities.provider.name,
      model: capabilities.modelId,
      endpoint: resolveEndpoint(capabilities.provider, draft.endpoint, endpointSpec, capabilities.modelId),
      headers: buildHeaders(capabilities.provider, endpointSpec),
      auth: buildAuthTemplate(capabilities.provider),
      body: applyFieldMappings(encoded, capabilities.mappings)
    },
    diagnostics
  });
}

function clampDiagnostic(violation: RangeViolation, modelId: string): TranslationDiagnostic {
  return {
    feature: violation.parameter,
    action: 'clamp',
    path: `$.sampling.${violation.parameter}`,
    message: `Value ${violation.value} clamped to model '${modelId}' supported range ${formatRange(violation.range)}`,
    original: violation.value,
    clamped: violation.clamped
  };
}

function missingFeatures(required: readonly Feature[], supported: ReadonlySet<Feature>): Feature[] {
  return required.filter((feature) => !supported.has(feature));
}

export function resolveEndpoint(
  provider: ProviderInfo,
  capability: EndpointCapability,
  endpoint: EndpointSpec,
  modelId: string
): ResolvedEndpoint {
  const path = endpoint.path.split('{model}').join(encodeURIComponent(modelId));
  const base = provider.baseUrl.replace(/\/+$/, '');
  const joinedPath = path.startsWith('/') || path === '' ? path : `/${path}`;
  const queryKeys = Object.keys(endpoint.query).sort();
  const query = new URLSearchParams(queryKeys.map((key): [string, string] => [key, endpoint.query[key]])).toString();
  return {
    capability,
    method: endpoint.method,
    path,
    protocol: endpoint.protocol,
    url: `${base}${joinedPath}${query ? `?${query}` : ''}`
  };
}

/** Header names are lower-cased; endpoint headers override provider headers. */
export function buildHeaders(provider: ProviderInfo, endpoint: EndpointSpec): Record<string, string> {
  const headers: Record<string, string> = { [HTTP_HEADERS.CONTENT_TYPE]: CONTENT_TYPES.JSON };
  if (endpoint.protocol === 'sse') {
    headers[HTTP_HEADERS.ACCEPT] = CONTENT_TYPES.EVENT_STREAM;
  }
  for (const source of [provider.headers, endpoint.headers]) {
    for (const key of Object.keys(source).sort()) {
      headers[key.toLowerCase()] = source[key];
    }
  }
  return headers;
}

function buildAuthTemplate(provider: ProviderInfo): AuthTemplate | undefined {
  const auth = provider.auth;
  if (!auth) {
    return undefined;
  }
  if (auth.type === 'bearer') {
    return { header: HTTP_HEADERS.AUTHORIZATION, scheme: 'Bearer', valueTemplate: auth.valueTemplate };
  }
  return { header: auth.header.toLowerCase(), valueTemplate: auth.valueTemplate };
}
