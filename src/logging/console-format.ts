import { inspect } from 'node:util';

/** Limits for rendering structured log data onto a single console line. */
export interface ConsoleFormatOptions {
  maxLength?: number;
  depth?: number;
}

const LIMITS = {
  maxLength: 1600,
  depth: 4,
  arrayItems: 20,
  stringChars: 512
} as const;

// room kept for the "...[truncated N chars]" marker
const TRUNCATION_RESERVE = 32;

export function clampStringLength(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value;
  }
  const kept = Math.max(0, maxLength - TRUNCATION_RESERVE);
  return `${value.slice(0, kept)}...[truncated ${value.length - kept} chars]`;
}

export function formatValueForConsole(value: unknown, options: ConsoleFormatOptions = {}): string {
  const rendered =
    typeof value === 'string'
      ? value
      : inspect(value, {
          depth: options.depth ?? LIMITS.depth,
          maxArrayLength: LIMITS.arrayItems,
          maxStringLength: LIMITS.stringChars,
          breakLength: Infinity,
          compact: 3
        });
  return clampStringLength(rendered, options.maxLength ?? LIMITS.maxLength);
}
