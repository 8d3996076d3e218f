import { describe, expect, it } from '@jest/globals';

import { ErrorKind } from '../../src/error-handling/error-kinds.js';
import { HttpAbortError, HttpStatusError } from '../../src/execution/http-client.js';
import {
  classifyHttpFailure,
  classifyProviderError,
  extractUpstreamError,
  parseRetryAfter
} from '../../src/execution/provider-error-classifier.js';

describe('classifyHttpFailure', () => {
  it('401 and 403 map to authentication errors', () => {
    const body = { error: { message: 'Incorrect API key provided', type: 'invalid_request_error', code: 'invalid_api_key' } };
    expect(classifyHttpFailure(401, body, {})).toEqual({
      kind: ErrorKind.AuthenticationError,
      message: 'HTTP 401: Incorrect API key provided',
      statusCode: 401,
      upstreamCode: 'invalid_api_key',
      upstreamMessage: 'Incorrect API key provided'
    });
    expect(classifyHttpFailure(403, undefined, {}).kind).toBe(ErrorKind.AuthenticationError);
  });

  it('429 carries retry-after seconds', () => {
    const result = classifyHttpFailure(429, { type: 'error', error: { type: 'rate_limit_error', message: 'slow down' } }, {
      'retry-after': '7'
    });
    expect(result.kind).toBe(ErrorKind.RateLimitError);
    expect(result.retryAfterSeconds).toBe(7);
    expect(result.upstreamCode).toBe('rate_limit_error');
    expect(result.message).toBe('HTTP 429: slow down');
  });

  it('quota codes on other statuses are rate limits', () => {
    const result = classifyHttpFailure(400, { error: { code: 'insufficient_quota', message: 'quota' } }, {});
    expect(result.kind).toBe(ErrorKind.RateLimitError);
    expect(result.retryAfterSeconds).toBeUndefined();
  });

  it('a 400 with an invalid key reason is an authentication error', () => {
    const body = {
      error: {
        code: 400,
        status: 'INVALID_ARGUMENT',
        message: 'API key not valid. Please pass a valid API key.',
        details: [{ '@type': 'type.googleapis.com/google.rpc.ErrorInfo', reason: 'API_KEY_INVALID' }]
      }
    };
    const result = classifyHttpFailure(400, body, {});
    expect(result.kind).toBe(ErrorKind.AuthenticationError);
    expect(result.upstreamCode).toBe('API_KEY_INVALID');
  });

  it('other statuses are network errors', () => {
    expect(classifyHttpFailure(503, 'busy', {})).toEqual({
      kind: ErrorKind.NetworkError,
      message: 'HTTP 503',
      statusCode: 503,
      upstreamCode: undefined,
      upstreamMessage: undefined
    });
  });
});

describe('extractUpstreamError', () => {
  it('reads the common provider error shapes', () => {
    expect(extractUpstreamError({ error: 'bad request' })).toEqual({ message: 'bad request' });
    expect(extractUpstreamError({ message: 'plain' })).toEqual({ message: 'plain' });
    expect(extractUpstreamError({ error: { status: 'RESOURCE_EXHAUSTED', message: 'quota' } })).toEqual({
      code: 'RESOURCE_EXHAUSTED',
      message: 'quota'
    });
    expect(extractUpstreamError(null)).toEqual({});
  });
});

describe('parseRetryAfter', () => {
  it('accepts delta seconds and HTTP dates', () => {
    const now = Date.parse('2026-01-01T00:00:00Z');
    expect(parseRetryAfter(' 12 ', now)).toBe(12);
    expect(parseRetryAfter('Thu, 01 Jan 2026 00:00:30 GMT', now)).toBe(30);
    expect(parseRetryAfter('Wed, 31 Dec 2025 23:59:00 GMT', now)).toBe(0);
    expect(parseRetryAfter('soon', now)).toBeUndefined();
    expect(parseRetryAfter(undefined, now)).toBeUndefined();
  });
});

describe('classifyProviderError', () => {
  it('separates timeouts from cancellation', () => {
    expect(classifyProviderError(new HttpAbortError('timeout', 'x'), 5)).toEqual({
      kind: ErrorKind.TimeoutError,
      message: 'Request timed out after 5s'
    });
    expect(classifyProviderError(new HttpAbortError('cancelled', 'Request was cancelled'), 5)).toEqual({
      kind: ErrorKind.Cancelled,
      message: 'Request was cancelled'
    });
  });

  it('uses the parsed body of status errors', () => {
    const error = new HttpStatusError({
      status: 401,
      statusText: 'Unauthorized',
      headers: {},
      body: '{"error":{"message":"no key"}}',
      url: 'http://127.0.0.1/'
    });
    const result = classifyProviderError(error, 5);
    expect(result.kind).toBe(ErrorKind.AuthenticationError);
    expect(result.message).toBe('HTTP 401: no key');
  });
});
