/**
 * Spec 校验器 - JSON Schema (ajv) + 交叉引用规则 + 版本兼容性
 *
 * A fresh Ajv instance is built for every call; nothing is cached between calls.
 */

import Ajv from 'ajv';
import type { AnySchema, ErrorObject } from 'ajv';

import type { SpecType } from '../spec/types.js';
import { isPlainObject } from '../utils/json-guards.js';
import { checkPromptSpecRules } from './prompt-spec-rules.js';
import { checkProviderSpecRules } from './provider-spec-rules.js';
import { checkSpecVersion } from './semver.js';
import type { SpecVersionRange } from './semver.js';
import { errorFinding, warningFinding } from './types.js';
import type { ValidationFinding, ValidationMode, ValidationReport } from './types.js';
import promptSpecBasicSchema from './schemas/prompt-spec.basic.json';
import promptSpecStrictSchema from './schemas/prompt-spec.strict.json';
import providerSpecBasicSchema from './schemas/provider-spec.basic.json';
import providerSpecStrictSchema from './schemas/provider-spec.strict.json';

export interface ValidateSpecOptions {
  supportedVersions: SpecVersionRange;
}

const SCHEMAS: Record<SpecType, Record<'base' | 'strict', AnySchema>> = {
  prompt_spec: { base: promptSpecBasicSchema, strict: promptSpecStrictSchema },
  provider_spec: { base: providerSpecBasicSchema, strict: providerSpecStrictSchema }
};

export function validateSpec(
  value: unknown,
  specType: SpecType,
  mode: ValidationMode,
  options: ValidateSpecOptions
): ValidationReport {
  const schema = mode === 'strict' ? SCHEMAS[specType].strict : SCHEMAS[specType].base;
  const findings: ValidationFinding[] = [...checkSchema(schema, value)];

  if (mode !== 'basic') {
    findings.push(...(specType === 'prompt_spec' ? checkPromptSpecRules(value) : checkProviderSpecRules(value)));
  }
  if (mode === 'strict') {
    findings.push(...checkVersion(value, specType, options.supportedVersions));
  }

  const unique = dedupeFindings(findings);
  return {
    specType,
    mode,
    valid: unique.every((finding) => finding.severity !== 'error'),
    findings: unique
  };
}

function checkSchema(schema: AnySchema, value: unknown): ValidationFinding[] {
  const ajv = new Ajv({ allErrors: true, strict: false, $data: true });
  const validate = ajv.compile(schema);
  if (validate(value)) {
    return [];
  }
  return (validate.errors ?? []).filter((error) => error.keyword !== 'if').map(toFinding);
}

function toFinding(error: ErrorObject): ValidationFinding {
  const base = pointerToPath(error.instancePath);
  const params: Record<string, unknown> = error.params;
  if (error.keyword === 'required' && typeof params.missingProperty === 'string') {
    return errorFinding(
      `${base}.${params.missingProperty}`,
      `Required field '${params.missingProperty}' is missing`
    );
  }
  if (error.keyword === 'additionalProperties' && typeof params.additionalProperty === 'string') {
    return errorFinding(`${base}.${params.additionalProperty}`, `Unknown field '${params.additionalProperty}'`);
  }
  if (error.keyword === 'enum' && Array.isArray(params.allowedValues)) {
    const allowed: unknown[] = params.allowedValues;
    return errorFinding(base, `must be one of: ${allowed.map((entry) => JSON.stringify(entry)).join(', ')}`);
  }
  return errorFinding(base, error.message ?? `failed '${error.keyword}' check`);
}

/** `/models/0/id` -> `$.models[0].id` */
export function pointerToPath(pointer: string): string {
  if (!pointer) {
    return '$';
  }
  return pointer
    .split('/')
    .slice(1)
    .map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'))
    .reduce((acc, segment) => (/^\d+$/.test(segment) ? `${acc}[${segment}]` : `${acc}.${segment}`), '$');
}

function checkVersion(value: unknown, specType: SpecType, range: SpecVersionRange): ValidationFinding[] {
  if (!isPlainObject(value)) {
    return [];
  }
  const version = value.spec_version;
  if (version === undefined) {
    return specType === 'provider_spec'
      ? [errorFinding('$.spec_version', "Required field 'spec_version' is missing")]
      : [warningFinding('$.spec_version', 'spec_version is not declared; version compatibility was not checked')];
  }
  if (typeof version !== 'string') {
    // the schema already reports the type mismatch
    return [];
  }
  const check = checkSpecVersion(version, range);
  return check.compatible ? [] : [errorFinding('$.spec_version', check.message)];
}

function dedupeFindings(findings: ValidationFinding[]): ValidationFinding[] {
  const seen = new Set<string>();
  return findings.filter((finding) => {
    const key = `${finding.severity}|${finding.path}|${finding.message}`;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}
