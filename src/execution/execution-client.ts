/**
 * Execution Client - 发送已翻译的 provider 请求并分类失败
 */

import { DEFAULT_ENGINE_CONFIG } from '../config/engine-config.js';
import type { EngineConfig } from '../config/engine-config.js';
import { ENGINE_DEFAULTS, HTTP_HEADERS } from '../constants/index.js';
import { ErrorKind } from '../error-handling/error-kinds.js';
import type { FailureKind } from '../error-handling/error-kinds.js';
import type { UnifiedLogger } from '../logging/index.js';
import type { ProviderRequest } from '../translation/types.js';
import { resolveAuthHeader } from './auth-template.js';
import { HttpClient } from './http-client.js';
import { classifyProviderError } from './provider-error-classifier.js';

export const SUPPORTED_PROTOCOLS: ReadonlySet<string> = new Set(['http', 'https', 'sse']);

const METHODS_WITHOUT_BODY: ReadonlySet<string> = new Set(['GET', 'HEAD']);

export interface ExecuteOptions {
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  config?: EngineConfig;
  logger?: UnifiedLogger;
  httpClient?: HttpClient;
}

export interface ExecutionSuccess {
  ok: true;
  status: number;
  headers: Record<string, string>;
  /** raw response body (JSON text, or the raw event stream for sse) */
  body: string;
  elapsedMs: number;
  endpoint: string;
}

export interface ExecutionFailure {
  ok: false;
  kind: FailureKind;
  message: string;
  status?: number;
  retryAfterSeconds?: number;
  elapsedMs: number;
  endpoint: string;
}

export type ExecutionOutcome = ExecutionSuccess | ExecutionFailure;

export async function executeRequest(
  request: ProviderRequest,
  timeoutSeconds: number,
  options: ExecuteOptions = {}
): Promise<ExecutionOutcome> {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const endpoint = request.endpoint.url;
  const startedAt = performance.now();
  const elapsed = (): number => Math.round(performance.now() - startedAt);
  const failure = (kind: FailureKind, message: string): ExecutionFailure => ({
    ok: false,
    kind,
    message,
    elapsedMs: elapsed(),
    endpoint
  });

  if (!Number.isInteger(timeoutSeconds) || timeoutSeconds < 0) {
    return failure(ErrorKind.InvalidInput, `Timeout must be a non-negative whole number of seconds, got ${timeoutSeconds}`);
  }
  if (timeoutSeconds > ENGINE_DEFAULTS.MAX_TIMEOUT_SECONDS) {
    return failure(
      ErrorKind.InvalidInput,
      `Timeout must be at most ${ENGINE_DEFAULTS.MAX_TIMEOUT_SECONDS} seconds, got ${timeoutSeconds}`
    );
  }
  const effectiveTimeout = timeoutSeconds === 0 ? config.defaultTimeoutSeconds : timeoutSeconds;

  const protocol = request.endpoint.protocol.toLowerCase();
  if (!SUPPORTED_PROTOCOLS.has(protocol)) {
    return failure(ErrorKind.NotImplemented, `Protocol '${request.endpoint.protocol}' is not supported for execution`);
  }
  if (!isHttpUrl(endpoint)) {
    return failure(ErrorKind.InvalidInput, `Endpoint URL '${endpoint}' is not an absolute http(s) URL`);
  }

  const auth = resolveAuthHeader(request.auth, options.env ?? process.env);
  if (!auth.ok) {
    return failure(auth.kind, auth.message);
  }

  const headers: Record<string, string> = { [HTTP_HEADERS.USER_AGENT]: config.userAgent, ...request.headers };
  if (auth.value) {
    headers[auth.value.header] = auth.value.value;
  }
  const method = request.endpoint.method.toUpperCase();
  const client = options.httpClient ?? new HttpClient();
  const logger = options.logger;
  logger?.info('Sending provider request', { method, endpoint, provider: request.provider, model: request.model });

  try {
    const response = await client.send({
      method,
      url: endpoint,
      headers,
      body: METHODS_WITHOUT_BODY.has(method) ? undefined : JSON.stringify(request.body),
      timeoutMs: effectiveTimeout * 1000,
      signal: options.signal
    });
    const elapsedMs = elapsed();
    logger?.info('Provider request completed', { status: response.status, elapsedMs });
    return {
      ok: true,
      status: response.status,
      headers: response.headers,
      body: response.body,
      elapsedMs,
      endpoint
    };
  } catch (error) {
    const classification = classifyProviderError(error, effectiveTimeout);
    const result = failure(classification.kind, classification.message);
    if (classification.statusCode !== undefined) {
      result.status = classification.statusCode;
    }
    if (classification.retryAfterSeconds !== undefined) {
      result.retryAfterSeconds = classification.retryAfterSeconds;
    }
    logger?.warn('Provider request failed', {
      kind: classification.kind,
      status: classification.statusCode,
      upstreamCode: classification.upstreamCode,
      elapsedMs: result.elapsedMs
    });
    return result;
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
