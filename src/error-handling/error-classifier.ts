import { EngineError, ErrorKind } from './error-kinds.js';

export type ErrorClassification = {
  kind: Exclude<ErrorKind, ErrorKind.Success>;
  message: string;
};

const NETWORK_ERROR_CODE_SET = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ETIMEDOUT',
  'ECONNABORTED',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'CERT_HAS_EXPIRED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE'
]);

const NETWORK_MESSAGE_HINTS = [
  'fetch failed',
  'network timeout',
  'socket hang up',
  'client network socket disconnected',
  'tls handshake timeout',
  'unable to verify the first certificate',
  'network error',
  'temporarily unreachable'
];

/**
 * Maps an arbitrary thrown value onto the stable error taxonomy.
 */
export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof EngineError) {
    return { kind: error.kind, message: error.message };
  }
  if (!(error instanceof Error)) {
    return { kind: ErrorKind.Unknown, message: describeNonError(error) };
  }
  const message = error.message || error.name;
  if (error instanceof SyntaxError) {
    return { kind: ErrorKind.JsonError, message };
  }
  if (error instanceof RangeError && /invalid string length|allocation failed|array buffer allocation/i.test(message)) {
    return { kind: ErrorKind.MemoryError, message };
  }
  if (error.name === 'AbortError') {
    return { kind: ErrorKind.Cancelled, message };
  }
  if (error.name === 'TimeoutError') {
    return { kind: ErrorKind.TimeoutError, message };
  }
  if (looksLikeNetworkTransportError(error)) {
    return { kind: ErrorKind.NetworkError, message: describeNetworkError(error) };
  }
  return { kind: ErrorKind.InternalError, message };
}

export function readErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}

/**
 * fetch wraps socket failures in `TypeError('fetch failed')` with the
 * underlying system error on `cause`.
 */
export function looksLikeNetworkTransportError(error: Error): boolean {
  const codes = [readErrorCode(error), readErrorCode(error.cause)];
  if (codes.some((code) => code !== undefined && NETWORK_ERROR_CODE_SET.has(code))) {
    return true;
  }
  const msgLower = error.message.toLowerCase();
  return NETWORK_MESSAGE_HINTS.some((hint) => msgLower.includes(hint));
}

function describeNetworkError(error: Error): string {
  const cause = error.cause;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message}: ${cause.message}`;
  }
  return error.message;
}

function describeNonError(value: unknown): string {
  if (value === undefined || value === null) {
    return 'unknown error';
  }
  if (typeof value === 'string') {
    return value;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
