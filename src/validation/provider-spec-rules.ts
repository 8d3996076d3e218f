/**
 * Cross-reference rules for provider specs (partial and strict modes).
 *
 * Rules read the raw JSON and skip anything of the wrong type; the structural
 * schema reports those.
 */

import { ENV_TEMPLATE_PATTERN } from '../constants/index.js';
import { ENDPOINT_CAPABILITIES, INPUT_MODES, KNOWN_PROTOCOLS, PARAMETER_NAMES, RANGED_PARAMETERS } from '../spec/types.js';
import { isPlainObject, isReservedKey, readObject, readString } from '../utils/json-guards.js';
import { errorFinding, warningFinding } from './types.js';
import type { ValidationFinding } from './types.js';

const KNOWN_ENDPOINTS: ReadonlySet<string> = new Set(ENDPOINT_CAPABILITIES);
const KNOWN_INPUT_MODES: ReadonlySet<string> = new Set(INPUT_MODES);
const KNOWN_PROTOCOL_SET: ReadonlySet<string> = new Set(KNOWN_PROTOCOLS);
const TOGGLED_PARAMETERS: ReadonlySet<string> = new Set(PARAMETER_NAMES);
const KNOWN_PARAMETERS: ReadonlySet<string> = new Set([...PARAMETER_NAMES, ...RANGED_PARAMETERS]);

export function checkProviderSpecRules(spec: unknown): ValidationFinding[] {
  if (!isPlainObject(spec)) {
    return [];
  }
  const findings: ValidationFinding[] = [];
  const provider = readObject(spec, 'provider');
  if (provider) {
    findings.push(...checkProviderInfo(provider));
  }
  const models = spec.models;
  if (Array.isArray(models)) {
    findings.push(...checkModelIdentity(models));
    models.forEach((model, index) => {
      if (isPlainObject(model)) {
        findings.push(...checkModel(model, `$.models[${index}]`));
      }
    });
  }
  return findings;
}

function checkProviderInfo(provider: Record<string, unknown>): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  const baseUrl = readString(provider, 'base_url');
  if (baseUrl !== undefined && !isHttpUrl(baseUrl)) {
    findings.push(errorFinding('$.provider.base_url', `base_url '${baseUrl}' must be an absolute http(s) URL`));
  }
  const auth = readObject(provider, 'auth');
  const template = auth ? readString(auth, 'value_template') : undefined;
  if (template !== undefined) {
    const problem = describeTemplateProblem(template);
    if (problem) {
      findings.push(errorFinding('$.provider.auth.value_template', problem));
    }
  }
  return findings;
}

function checkModelIdentity(models: unknown[]): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  const idOwners = new Map<string, number>();
  models.forEach((model, index) => {
    const id = isPlainObject(model) ? readString(model, 'id') : undefined;
    if (id === undefined) {
      return;
    }
    const owner = idOwners.get(id);
    if (owner !== undefined) {
      findings.push(
        errorFinding(`$.models[${index}].id`, `Duplicate model id '${id}' (first declared at $.models[${owner}])`)
      );
      return;
    }
    idOwners.set(id, index);
  });

  const aliasOwners = new Map<string, number>();
  models.forEach((model, index) => {
    const aliases = isPlainObject(model) ? model.aliases : undefined;
    if (!Array.isArray(aliases)) {
      return;
    }
    aliases.forEach((alias, aliasIndex) => {
      if (typeof alias !== 'string') {
        return;
      }
      const path = `$.models[${index}].aliases[${aliasIndex}]`;
      const idOwner = idOwners.get(alias);
      if (idOwner !== undefined && idOwner !== index) {
        findings.push(errorFinding(path, `Alias '${alias}' shadows the id of $.models[${idOwner}]`));
        return;
      }
      const aliasOwner = aliasOwners.get(alias);
      if (aliasOwner !== undefined && aliasOwner !== index) {
        findings.push(errorFinding(path, `Alias '${alias}' is already used by $.models[${aliasOwner}]`));
        return;
      }
      aliasOwners.set(alias, index);
    });
  });
  return findings;
}

function checkModel(model: Record<string, unknown>, modelPath: string): ValidationFinding[] {
  const findings: ValidationFinding[] = [];

  const endpoints = readObject(model, 'endpoints');
  if (endpoints) {
    let knownCount = 0;
    for (const [name, endpoint] of Object.entries(endpoints)) {
      const endpointPath = `${modelPath}.endpoints.${name}`;
      if (!KNOWN_ENDPOINTS.has(name)) {
        findings.push(warningFinding(endpointPath, `Unknown endpoint capability '${name}' is ignored`));
        continue;
      }
      knownCount++;
      if (isPlainObject(endpoint)) {
        findings.push(...checkEndpoint(name, endpoint, endpointPath));
      }
    }
    if (knownCount === 0) {
      findings.push(
        errorFinding(`${modelPath}.endpoints`, 'Model declares no chat_completion or streaming_chat_completion endpoint')
      );
    }
  }

  const inputModes = readObject(model, 'input_modes');
  if (inputModes) {
    for (const flag of Object.keys(inputModes)) {
      if (!KNOWN_INPUT_MODES.has(flag)) {
        findings.push(warningFinding(`${modelPath}.input_modes.${flag}`, `Unknown input mode '${flag}' is ignored`));
      }
    }
    if (inputModes.messages === false && inputModes.single_text === false) {
      findings.push(
        errorFinding(`${modelPath}.input_modes`, 'Model accepts neither messages nor single_text input')
      );
    }
  }

  const parameters = readObject(model, 'parameters');
  if (parameters) {
    for (const name of Object.keys(parameters)) {
      if (!KNOWN_PARAMETERS.has(name)) {
        findings.push(warningFinding(`${modelPath}.parameters.${name}`, `Unknown parameter '${name}' is ignored`));
        continue;
      }
      const entry = readObject(parameters, name);
      if (entry && entry.supported !== undefined && !TOGGLED_PARAMETERS.has(name)) {
        findings.push(
          warningFinding(
            `${modelPath}.parameters.${name}.supported`,
            `Parameter '${name}' cannot be switched off; 'supported' is ignored`
          )
        );
      }
    }
  }

  const mappings = readObject(model, 'mappings');
  const paths = mappings ? readObject(mappings, 'paths') : undefined;
  if (paths) {
    for (const [from, to] of Object.entries(paths)) {
      if (!isDottedPath(from) || (typeof to === 'string' && !isDottedPath(to))) {
        findings.push(
          errorFinding(`${modelPath}.mappings.paths`, `Mapping '${from}' -> '${String(to)}' must use non-empty dotted paths`)
        );
      } else if (hasReservedSegment(from) || (typeof to === 'string' && hasReservedSegment(to))) {
        findings.push(
          errorFinding(`${modelPath}.mappings.paths`, `Mapping '${from}' -> '${String(to)}' names a reserved key`)
        );
      }
    }
  }
  const flags = mappings ? readObject(mappings, 'flags') : undefined;
  if (flags) {
    for (const key of Object.keys(flags).filter(isReservedKey)) {
      findings.push(errorFinding(`${modelPath}.mappings.flags`, `Flag '${key}' names a reserved key`));
    }
  }

  return findings;
}

function checkEndpoint(name: string, endpoint: Record<string, unknown>, endpointPath: string): ValidationFinding[] {
  const findings: ValidationFinding[] = [];
  const path = readString(endpoint, 'path');
  if (path !== undefined && !path.startsWith('/')) {
    findings.push(errorFinding(`${endpointPath}.path`, `Endpoint path '${path}' must start with '/'`));
  }
  const protocol = readString(endpoint, 'protocol');
  if (protocol !== undefined) {
    const normalized = protocol.toLowerCase();
    if (!KNOWN_PROTOCOL_SET.has(normalized)) {
      findings.push(warningFinding(`${endpointPath}.protocol`, `Unknown protocol '${protocol}'`));
    } else if (name === 'streaming_chat_completion' && normalized !== 'sse') {
      findings.push(
        warningFinding(`${endpointPath}.protocol`, `Streaming endpoint uses protocol '${protocol}', expected 'sse'`)
      );
    }
  }
  return findings;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === 'http:' || url.protocol === 'https:') && url.host !== '';
  } catch {
    return false;
  }
}

function isDottedPath(value: string): boolean {
  return value.length > 0 && value.split('.').every((segment) => segment.length > 0);
}

function hasReservedSegment(value: string): boolean {
  return value.split('.').some(isReservedKey);
}

/** Returns a problem description, or undefined when the template is usable. */
export function describeTemplateProblem(template: string): string | undefined {
  const references = template.match(ENV_TEMPLATE_PATTERN) ?? [];
  if (references.length === 0) {
    return `value_template '${template}' must reference a credential as \${ENV:NAME}`;
  }
  const remainder = template.replace(ENV_TEMPLATE_PATTERN, '');
  if (remainder.includes('${')) {
    return `value_template '${template}' contains a malformed placeholder; use \${ENV:NAME}`;
  }
  return undefined;
}
