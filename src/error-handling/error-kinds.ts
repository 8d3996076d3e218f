/**
 * 错误分类 - 稳定的错误码
 *
 * Numeric values are part of the external contract and never change.
 */

export enum ErrorKind {
  Success = 0,
  InvalidInput = -1,
  JsonError = -2,
  ProviderNotFound = -3,
  ModelNotFound = -4,
  NetworkError = -5,
  AuthenticationError = -6,
  RateLimitError = -7,
  TimeoutError = -8,
  InternalError = -9,
  MemoryError = -10,
  Utf8Error = -11,
  NullPointer = -12,
  Cancelled = -13,
  NotImplemented = -14,
  Unknown = -99
}

export type FailureKind = Exclude<ErrorKind, ErrorKind.Success>;

export type Success<T> = {
  ok: true;
  kind: ErrorKind.Success;
  value: T;
};

export type Failure = {
  ok: false;
  kind: FailureKind;
  message: string;
};

export type Outcome<T> = Success<T> | Failure;

export function ok<T>(value: T): Success<T> {
  return { ok: true, kind: ErrorKind.Success, value };
}

export function fail(kind: FailureKind, message: string): Failure {
  return { ok: false, kind, message };
}

export function errorKindName(kind: ErrorKind): string {
  return ErrorKind[kind] ?? 'Unknown';
}

/**
 * Error carrying an {@link ErrorKind}. Only thrown at the CLI edge, the engine
 * itself returns {@link Outcome} values.
 */
export class EngineError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string) {
    super(message);
    this.name = 'EngineError';
    this.kind = kind;
  }

  static fromFailure(failure: Failure): EngineError {
    return new EngineError(failure.kind, failure.message);
  }
}

/** Returns the value of a successful outcome or throws an {@link EngineError}. */
export function unwrapOutcome<T>(outcome: Outcome<T>): T {
  if (outcome.ok) {
    return outcome.value;
  }
  throw EngineError.fromFailure(outcome);
}
