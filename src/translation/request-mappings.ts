import type { FieldMappings, JsonObject, JsonValue } from '../spec/types.js';
import { isReservedKey } from '../utils/json-guards.js';

/**
 * Applies provider field mappings to an encoded body: dotted-path renames in
 * sorted key order, then flag merges in sorted key order. Returns a new body.
 * Paths or flags naming a reserved key are skipped.
 */
export function applyFieldMappings(body: JsonObject, mappings: FieldMappings): JsonObject {
  const result = structuredClone(body);
  for (const from of Object.keys(mappings.paths).sort()) {
    renamePath(result, from, mappings.paths[from]);
  }
  for (const key of Object.keys(mappings.flags).sort()) {
    if (!isReservedKey(key)) {
      result[key] = structuredClone(mappings.flags[key]);
    }
  }
  return result;
}

export function renamePath(target: JsonObject, from: string, to: string): void {
  const source = splitPath(from);
  const destination = splitPath(to);
  if (!source || !destination || from === to) {
    return;
  }
  const parent = walk(target, source.slice(0, -1), false);
  const leaf = source[source.length - 1];
  if (!parent || leaf === undefined || !Object.prototype.hasOwnProperty.call(parent, leaf)) {
    return;
  }
  const value = parent[leaf];
  delete parent[leaf];
  assign(target, destination, value);
}

export function setPath(target: JsonObject, path: string, value: JsonValue): void {
  const segments = splitPath(path);
  if (segments) {
    assign(target, segments, value);
  }
}

export function getPath(target: JsonObject, path: string): JsonValue | undefined {
  const segments = splitPath(path);
  if (!segments) {
    return undefined;
  }
  const parent = walk(target, segments.slice(0, -1), false);
  const leaf = segments[segments.length - 1];
  return parent && leaf !== undefined && Object.prototype.hasOwnProperty.call(parent, leaf) ? parent[leaf] : undefined;
}

/** Undefined when a segment is reserved. */
function splitPath(path: string): string[] | undefined {
  const segments = path.split('.').filter((segment) => segment.length > 0);
  return segments.some(isReservedKey) ? undefined : segments;
}

function assign(target: JsonObject, segments: readonly string[], value: JsonValue): void {
  const parent = walk(target, segments.slice(0, -1), true);
  const leaf = segments[segments.length - 1];
  if (parent && leaf !== undefined) {
    parent[leaf] = value;
  }
}

function walk(root: JsonObject, segments: readonly string[], create: boolean): JsonObject | undefined {
  let current: JsonObject = root;
  for (const segment of segments) {
    const next = Object.prototype.hasOwnProperty.call(current, segment) ? current[segment] : undefined;
    if (typeof next === 'object' && next !== null && !Array.isArray(next)) {
      current = next;
      continue;
    }
    if (!create || next !== undefined) {
      return undefined;
    }
    const created: JsonObject = {};
    current[segment] = created;
    current = created;
  }
  return current;
}
