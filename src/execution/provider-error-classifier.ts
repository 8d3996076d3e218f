import { HTTP_HEADERS } from '../constants/index.js';
import { classifyError } from '../error-handling/error-classifier.js';
import { ErrorKind } from '../error-handling/error-kinds.js';
import type { FailureKind } from '../error-handling/error-kinds.js';
import { isPlainObject, readString } from '../utils/json-guards.js';
import { HttpAbortError, HttpStatusError } from './http-client.js';

export type ProviderErrorClassification = {
  kind: FailureKind;
  message: string;
  statusCode?: number;
  upstreamCode?: string;
  upstreamMessage?: string;
  retryAfterSeconds?: number;
};

export type UpstreamError = {
  code?: string;
  message?: string;
};

const AUTH_UPSTREAM_CODES = new Set([
  'invalid_api_key',
  'authentication_error',
  'permission_error',
  'unauthenticated',
  'permission_denied',
  'api_key_invalid'
]);

const RATE_LIMIT_UPSTREAM_CODES = new Set([
  'rate_limit_exceeded',
  'rate_limit_error',
  'insufficient_quota',
  'resource_exhausted'
]);

export function classifyProviderError(error: unknown, timeoutSeconds: number): ProviderErrorClassification {
  if (error instanceof HttpAbortError) {
    return error.abortCause === 'timeout'
      ? { kind: ErrorKind.TimeoutError, message: `Request timed out after ${timeoutSeconds}s` }
      : { kind: ErrorKind.Cancelled, message: error.message };
  }
  if (error instanceof HttpStatusError) {
    return classifyHttpFailure(error.status, error.data, error.headers);
  }
  return classifyError(error);
}

/**
 * Status codes decide first; provider bodies can still flag auth or quota
 * failures that arrive with other statuses (e.g. Gemini's 400 for a bad key).
 */
export function classifyHttpFailure(
  status: number,
  body: unknown,
  headers: Record<string, string>
): ProviderErrorClassification {
  const upstream = extractUpstreamError(body);
  const upstreamCode = upstream.code?.toLowerCase();
  const message = upstream.message ? `HTTP ${status}: ${upstream.message}` : `HTTP ${status}`;
  const base = {
    message,
    statusCode: status,
    upstreamCode: upstream.code,
    upstreamMessage: upstream.message
  };

  if (status === 429 || (status !== 401 && status !== 403 && upstreamCode && RATE_LIMIT_UPSTREAM_CODES.has(upstreamCode))) {
    const retryAfterSeconds = parseRetryAfter(headers[HTTP_HEADERS.RETRY_AFTER]);
    return retryAfterSeconds === undefined
      ? { ...base, kind: ErrorKind.RateLimitError }
      : { ...base, kind: ErrorKind.RateLimitError, retryAfterSeconds };
  }
  if (status === 401 || status === 403 || (upstreamCode && AUTH_UPSTREAM_CODES.has(upstreamCode))) {
    return { ...base, kind: ErrorKind.AuthenticationError };
  }
  return { ...base, kind: ErrorKind.NetworkError };
}

/**
 * OpenAI: `{error: {code, type, message}}`; Anthropic: `{type: 'error', error: {type, message}}`;
 * Gemini: `{error: {code: 429, status, message}}`.
 */
export function extractUpstreamError(body: unknown): UpstreamError {
  if (!isPlainObject(body)) {
    return {};
  }
  const error = body.error;
  if (typeof error === 'string') {
    return { message: error };
  }
  if (!isPlainObject(error)) {
    return { message: readString(body, 'message') };
  }
  const details = Array.isArray(error.details) ? error.details.filter(isPlainObject) : [];
  const reason = details.map((detail) => readString(detail, 'reason')).find((entry) => entry !== undefined);
  const code =
    readString(error, 'code') ?? reason ?? readString(error, 'status') ?? readString(error, 'type');
  return { code, message: readString(error, 'message') };
}

/** Retry-After is either delta-seconds or an HTTP date. */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, Math.ceil((date - now) / 1000));
}
