/**
 * Engine operations - translate / run / validate
 *
 * Every operation takes text and returns an {@link Outcome}. Expected failures
 * are outcomes; anything thrown inside an operation is classified and logged.
 */

import { resolveModel } from './capabilities/capability-resolver.js';
import { DEFAULT_ENGINE_CONFIG } from './config/engine-config.js';
import type { EngineConfig } from './config/engine-config.js';
import { classifyError } from './error-handling/error-classifier.js';
import { ErrorKind, errorKindName, fail, ok } from './error-handling/error-kinds.js';
import type { Failure, Outcome } from './error-handling/error-kinds.js';
import { executeRequest } from './execution/execution-client.js';
import type { ExecutionOutcome } from './execution/execution-client.js';
import type { HttpClient } from './execution/http-client.js';
import { createLogger } from './logging/index.js';
import type { UnifiedLogger } from './logging/index.js';
import { parseJsonText, parseProviderSpec, parsePromptSpec, parseSpecType } from './spec/parser.js';
import type { PromptSpec, ProviderSpec } from './spec/types.js';
import { decodeProviderRequest, toTranslationResultJson } from './translation/request-document.js';
import { translatePrompt } from './translation/translator.js';
import { TRANSLATION_MODES, parseTranslationMode } from './translation/types.js';
import type { ProviderRequest, TranslationMode, TranslationResult } from './translation/types.js';
import { validateSpec } from './validation/spec-validator.js';
import { VALIDATION_MODES, parseValidationMode } from './validation/types.js';
import type { ValidationReport } from './validation/types.js';

export type EngineOperation = 'translate' | 'run' | 'validate';

export interface EngineOptions {
  config?: EngineConfig;
  /** defaults to a fresh logger per call at `config.logLevel` */
  logger?: UnifiedLogger;
}

export interface RunOptions extends EngineOptions {
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  httpClient?: HttpClient;
}

export function translate(
  promptText: string,
  providerText: string,
  modelId: string,
  mode: string,
  options: EngineOptions = {}
): Outcome<string> {
  const logger = operationLogger('translate', options);
  return guard(logger, () => {
    const inputs = requireTexts({ prompt_spec_text: promptText, provider_spec_text: providerText, model_id: modelId, mode });
    if (!inputs.ok) {
      return inputs;
    }
    const translationMode = parseTranslationMode(mode);
    if (!translationMode) {
      return fail(ErrorKind.InvalidInput, `Unknown translation mode '${mode}' (expected ${TRANSLATION_MODES.join(' or ')})`);
    }
    const prompt = parsePromptSpec(promptText);
    if (!prompt.ok) {
      return prompt;
    }
    const provider = parseProviderSpec(providerText);
    if (!provider.ok) {
      return provider;
    }
    const result = translateSpecs(prompt.value, provider.value, modelId, translationMode, logger);
    return result.ok ? ok(JSON.stringify(toTranslationResultJson(result.value), null, 2)) : result;
  });
}

/** Typed form of {@link translate} for callers that already hold parsed specs. */
export function translateSpecs(
  prompt: PromptSpec,
  provider: ProviderSpec,
  modelId: string,
  mode: TranslationMode,
  logger?: UnifiedLogger
): Outcome<TranslationResult> {
  const capabilities = resolveModel(provider, modelId);
  if (!capabilities.ok) {
    return capabilities;
  }
  logger?.updateContext({ provider: capabilities.value.provider.name, modelId: capabilities.value.modelId });
  return translatePrompt(prompt, capabilities.value, mode, logger);
}

/**
 * Sends a translated request. On success the value is the raw response body;
 * the body is not re-validated before sending.
 */
export async function run(requestText: string, timeoutSeconds: number, options: RunOptions = {}): Promise<Outcome<string>> {
  const logger = operationLogger('run', options);
  return guardAsync(logger, async () => {
    const request = parseProviderRequest(requestText);
    if (!request.ok) {
      return request;
    }
    const outcome = await runRequest(request.value, timeoutSeconds, { ...options, logger });
    if (outcome.ok) {
      return ok(outcome.body);
    }
    const retry = outcome.retryAfterSeconds !== undefined ? ` (retry after ${outcome.retryAfterSeconds}s)` : '';
    return fail(outcome.kind, `${outcome.message}${retry}`);
  });
}

export function parseProviderRequest(requestText: string): Outcome<ProviderRequest> {
  const text = requireTexts({ provider_request_text: requestText });
  if (!text.ok) {
    return text;
  }
  const json = parseJsonText(requestText, 'provider request');
  return json.ok ? decodeProviderRequest(json.value) : json;
}

/** Typed form of {@link run}; keeps status, headers and timing. */
export function runRequest(
  request: ProviderRequest,
  timeoutSeconds: number,
  options: RunOptions = {}
): Promise<ExecutionOutcome> {
  return executeRequest(request, timeoutSeconds, {
    signal: options.signal,
    env: options.env,
    config: options.config,
    logger: options.logger,
    httpClient: options.httpClient
  });
}

export function validate(specText: string, specType: string, mode: string, options: EngineOptions = {}): Outcome<string> {
  const logger = operationLogger('validate', options);
  return guard(logger, () => {
    const report = validateText(specText, specType, mode, options);
    if (!report.ok) {
      return report;
    }
    logger.debug('Validation finished', { valid: report.value.valid, findings: report.value.findings.length });
    return ok(JSON.stringify(toValidationReportJson(report.value), null, 2));
  });
}

/** Typed form of {@link validate}. */
export function validateText(
  specText: string,
  specType: string,
  mode: string,
  options: EngineOptions = {}
): Outcome<ValidationReport> {
  const inputs = requireTexts({ spec_text: specText, spec_type: specType, mode });
  if (!inputs.ok) {
    return inputs;
  }
  const type = parseSpecType(specType);
  if (!type) {
    return fail(ErrorKind.InvalidInput, `Unknown spec type '${specType}' (expected prompt_spec or provider_spec)`);
  }
  const validationMode = parseValidationMode(mode);
  if (!validationMode) {
    return fail(ErrorKind.InvalidInput, `Unknown validation mode '${mode}' (expected ${VALIDATION_MODES.join(', ')})`);
  }
  const json = parseJsonText(specText, type === 'prompt_spec' ? 'prompt spec' : 'provider spec');
  if (!json.ok) {
    return json;
  }
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  return ok(validateSpec(json.value, type, validationMode, { supportedVersions: config.supportedSpecVersions }));
}

export function toValidationReportJson(report: ValidationReport): {
  spec_type: string;
  mode: string;
  valid: boolean;
  findings: Array<{ severity: string; path: string; message: string }>;
} {
  return {
    spec_type: report.specType,
    mode: report.mode,
    valid: report.valid,
    findings: report.findings.map((finding) => ({ ...finding }))
  };
}

function operationLogger(operation: EngineOperation, options: EngineOptions): UnifiedLogger {
  const logger =
    options.logger ??
    createLogger({
      moduleId: `engine.${operation}`,
      moduleType: 'engine',
      logLevel: (options.config ?? DEFAULT_ENGINE_CONFIG).logLevel
    });
  logger.updateContext({ operation });
  return logger;
}

/** Callers outside TypeScript can still hand in null or a non-string. */
function requireTexts(inputs: Record<string, unknown>): Outcome<void> {
  for (const [name, value] of Object.entries(inputs)) {
    if (value === null || value === undefined) {
      return fail(ErrorKind.NullPointer, `${name} must not be null`);
    }
    if (typeof value !== 'string') {
      return fail(ErrorKind.InvalidInput, `${name} must be a string, got ${typeof value}`);
    }
  }
  return ok(undefined);
}

function guard<T>(logger: UnifiedLogger, body: () => Outcome<T>): Outcome<T> {
  try {
    return body();
  } catch (error) {
    return unexpectedFailure(logger, error);
  }
}

async function guardAsync<T>(logger: UnifiedLogger, body: () => Promise<Outcome<T>>): Promise<Outcome<T>> {
  try {
    return await body();
  } catch (error) {
    return unexpectedFailure(logger, error);
  }
}

function unexpectedFailure(logger: UnifiedLogger, error: unknown): Failure {
  const { kind, message } = classifyError(error);
  logger.error('Operation failed unexpectedly', error, { kind: errorKindName(kind) });
  return fail(kind, message);
}
