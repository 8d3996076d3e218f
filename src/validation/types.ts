import type { SpecType } from '../spec/types.js';

export const VALIDATION_MODES = ['basic', 'partial', 'strict'] as const;
export type ValidationMode = (typeof VALIDATION_MODES)[number];

export type FindingSeverity = 'error' | 'warning';

export interface ValidationFinding {
  severity: FindingSeverity;
  /** JSONPath-style location, e.g. `$.models[0].endpoints` */
  path: string;
  message: string;
}

export interface ValidationReport {
  specType: SpecType;
  mode: ValidationMode;
  valid: boolean;
  findings: ValidationFinding[];
}

export function parseValidationMode(value: string): ValidationMode | undefined {
  return VALIDATION_MODES.find((mode) => mode === value);
}

export function errorFinding(path: string, message: string): ValidationFinding {
  return { severity: 'error', path, message };
}

export function warningFinding(path: string, message: string): ValidationFinding {
  return { severity: 'warning', path, message };
}
