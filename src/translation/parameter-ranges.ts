/**
 * Supported ranges for numeric sampling parameters.
 */

import type { ParameterRange, PromptSpec, RangedParameter, SamplingParams } from '../spec/types.js';
import { RANGED_PARAMETERS } from '../spec/types.js';

const SAMPLING_FIELDS = {
  temperature: 'temperature',
  top_p: 'topP',
  top_k: 'topK',
  frequency_penalty: 'frequencyPenalty',
  presence_penalty: 'presencePenalty'
} as const satisfies Record<RangedParameter, keyof SamplingParams>;

export interface RangeViolation {
  parameter: RangedParameter;
  range: ParameterRange;
  value: number;
  clamped: number;
}

/** Sampling values outside their model range, in parameter order. */
export function findRangeViolations(
  prompt: PromptSpec,
  ranges: Partial<Record<RangedParameter, ParameterRange>>
): RangeViolation[] {
  const violations: RangeViolation[] = [];
  for (const parameter of RANGED_PARAMETERS) {
    const range = ranges[parameter];
    const value = prompt.sampling[SAMPLING_FIELDS[parameter]];
    if (!range || value === undefined) {
      continue;
    }
    const clamped = clamp(value, range);
    if (clamped !== value) {
      violations.push({ parameter, range, value, clamped });
    }
  }
  return violations;
}

export function applyClamps(prompt: PromptSpec, violations: readonly RangeViolation[]): PromptSpec {
  const sampling: SamplingParams = { ...prompt.sampling };
  for (const violation of violations) {
    sampling[SAMPLING_FIELDS[violation.parameter]] = violation.clamped;
  }
  return { ...prompt, sampling };
}

/** `[min, max]`, with `-inf` / `+inf` for an open side. */
export function formatRange(range: ParameterRange): string {
  return `[${range.min ?? '-inf'}, ${range.max ?? '+inf'}]`;
}

function clamp(value: number, range: ParameterRange): number {
  let result = value;
  if (range.min !== undefined && result < range.min) {
    result = range.min;
  }
  if (range.max !== undefined && result > range.max) {
    result = range.max;
  }
  return result;
}
