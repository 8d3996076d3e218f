/**
 * specforge - provider-agnostic prompt translation and validation
 */

export { translate, translateSpecs, run, runRequest, parseProviderRequest, validate, validateText, toValidationReportJson } from './engine.js';
export type { EngineOperation, EngineOptions, RunOptions } from './engine.js';

export { ErrorKind, EngineError, errorKindName, fail, ok, unwrapOutcome } from './error-handling/error-kinds.js';
export type { Failure, FailureKind, Outcome, Success } from './error-handling/error-kinds.js';
export { classifyError } from './error-handling/error-classifier.js';
export type { ErrorClassification } from './error-handling/error-classifier.js';

export { DEFAULT_ENGINE_CONFIG, EngineConfigSchema, loadEngineConfig } from './config/engine-config.js';
export type { EngineConfig, LoadEngineConfigOptions } from './config/engine-config.js';

export { createLogger, LogLevel, UnifiedModuleLogger } from './logging/index.js';
export type { LoggerConfig, UnifiedLogger, UnifiedLogEntry } from './logging/index.js';

export { parsePromptSpec, parseProviderSpec, parseSpec, parseSpecType } from './spec/parser.js';
export { decodeSpecText } from './spec/text-decoding.js';
export type {
  ContentPart,
  JsonObject,
  JsonValue,
  Message,
  ModelClass,
  ModelSpec,
  ParameterRange,
  PromptSpec,
  ProviderSpec,
  RangedParameter,
  SpecType
} from './spec/types.js';

export { validateSpec } from './validation/spec-validator.js';
export type { FindingSeverity, ValidationFinding, ValidationMode, ValidationReport } from './validation/types.js';

export { resolveModel } from './capabilities/capability-resolver.js';
export type { ModelCapabilities } from './capabilities/capability-resolver.js';
export { FEATURES } from './capabilities/features.js';
export type { Feature } from './capabilities/features.js';

export { translatePrompt } from './translation/translator.js';
export { toTranslationResultJson, decodeProviderRequest } from './translation/request-document.js';
export type {
  NormalizedResponse,
  ProviderRequest,
  TranslationDiagnostic,
  TranslationMode,
  TranslationResult
} from './translation/types.js';

export { executeRequest } from './execution/execution-client.js';
export type { ExecuteOptions, ExecutionFailure, ExecutionOutcome, ExecutionSuccess } from './execution/execution-client.js';
export { normalizeResponse, toNormalizedResponseJson } from './execution/response-normalizer.js';
