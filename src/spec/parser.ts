import type { ZodIssue } from 'zod';

import { ErrorKind, fail, ok } from '../error-handling/error-kinds.js';
import type { Outcome } from '../error-handling/error-kinds.js';
import { promptSpecDecoder, providerSpecDecoder } from './spec-schemas.js';
import type { ParsedSpec, PromptSpec, ProviderSpec, SpecType } from './types.js';

const SPEC_LABELS: Record<SpecType, string> = {
  prompt_spec: 'prompt spec',
  provider_spec: 'provider spec'
};

export function parseSpecType(value: string): SpecType | undefined {
  return value === 'prompt_spec' || value === 'provider_spec' ? value : undefined;
}

/**
 * JSON syntax errors are `JsonError`; everything after that is a shape problem.
 */
export function parseJsonText(text: string, label: string): Outcome<unknown> {
  try {
    return ok(JSON.parse(text));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail(ErrorKind.JsonError, `Invalid JSON in ${label}: ${reason}`);
  }
}

export function parsePromptSpec(text: string): Outcome<PromptSpec> {
  const json = parseJsonText(text, SPEC_LABELS.prompt_spec);
  return json.ok ? decodePromptSpec(json.value) : json;
}

export function parseProviderSpec(text: string): Outcome<ProviderSpec> {
  const json = parseJsonText(text, SPEC_LABELS.provider_spec);
  return json.ok ? decodeProviderSpec(json.value) : json;
}

export function decodePromptSpec(value: unknown): Outcome<PromptSpec> {
  const result = promptSpecDecoder.safeParse(value);
  if (!result.success) {
    return fail(ErrorKind.InvalidInput, describeIssues(SPEC_LABELS.prompt_spec, result.error.issues));
  }
  return ok(result.data);
}

export function decodeProviderSpec(value: unknown): Outcome<ProviderSpec> {
  const result = providerSpecDecoder.safeParse(value);
  if (!result.success) {
    return fail(ErrorKind.InvalidInput, describeIssues(SPEC_LABELS.provider_spec, result.error.issues));
  }
  return ok(result.data);
}

export function parseSpec(type: SpecType, text: string): Outcome<ParsedSpec> {
  if (type === 'prompt_spec') {
    const parsed = parsePromptSpec(text);
    return parsed.ok ? ok({ type, spec: parsed.value }) : parsed;
  }
  const parsed = parseProviderSpec(text);
  return parsed.ok ? ok({ type, spec: parsed.value }) : parsed;
}

/** `['models', 0, 'id']` -> `$.models[0].id` */
export function formatJsonPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : `${acc}.${segment}`),
    '$'
  );
}

function describeIssues(label: string, issues: ZodIssue[]): string {
  const [first] = issues;
  const detail = `${formatJsonPath(first.path)}: ${first.message}`;
  const more = issues.length > 1 ? ` (and ${issues.length - 1} more)` : '';
  return `Invalid ${label} at ${detail}${more}`;
}
