import { ErrorKind, fail, ok } from '../error-handling/error-kinds.js';
import type { Outcome } from '../error-handling/error-kinds.js';

/**
 * Strict UTF-8 decoding for spec files read as raw bytes. A leading BOM is dropped.
 */
export function decodeSpecText(bytes: Uint8Array, label = 'input'): Outcome<string> {
  try {
    return ok(new TextDecoder('utf-8', { fatal: true }).decode(bytes));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail(ErrorKind.Utf8Error, `${label} is not valid UTF-8: ${reason}`);
  }
}
