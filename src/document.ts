/**
 * Document Values — accessors over the JSON value model
 *
 * Accessors return `undefined` for absent or mistyped values so every walk
 * over a document can stay total.
 */

import type { JsonObject, JsonValue } from './types';

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asObject(value: JsonValue | undefined): JsonObject | undefined {
  return isJsonObject(value) ? value : undefined;
}

export function asArray(value: JsonValue | undefined): JsonValue[] | undefined {
  return Array.isArray(value) ? value : undefined;
}

export function asString(value: JsonValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/** Object-valued entries of `value`, skipping anything that is not a mapping. */
export function objectEntries(value: JsonValue | undefined): Array<[string, JsonObject]> {
  const obj = asObject(value);
  if (!obj) return [];
  const entries: Array<[string, JsonObject]> = [];
  for (const [key, child] of Object.entries(obj)) {
    if (isJsonObject(child)) entries.push([key, child]);
  }
  return entries;
}

/**
 * Every operation object under `paths.*.*`. Path items and operations that
 * are not mappings are skipped.
 */
export function operationsOf(document: JsonObject): JsonObject[] {
  const operations: JsonObject[] = [];
  for (const [, pathItem] of objectEntries(document.paths)) {
    for (const [, operation] of objectEntries(pathItem)) {
      operations.push(operation);
    }
  }
  return operations;
}

export function cloneDocument<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}

/**
 * Convert an arbitrary host value into a JsonValue. Strings at the top level
 * are treated as serialized JSON. Throws on values JSON cannot carry.
 */
export function toDocumentValue(raw: unknown): JsonValue {
  if (typeof raw === 'string') {
    const parsed: unknown = JSON.parse(raw);
    return convert(parsed, '$', new Set());
  }
  return convert(raw, '$', new Set());
}

function convert(value: unknown, path: string, seen: Set<object>): JsonValue {
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new TypeError(`non-finite number at ${path}`);
    }
    return value;
  }
  if (typeof value !== 'object') {
    throw new TypeError(`unsupported ${typeof value} value at ${path}`);
  }

  if (seen.has(value)) {
    throw new TypeError(`circular reference at ${path}`);
  }
  seen.add(value);

  let result: JsonValue;
  if (Array.isArray(value)) {
    result = value.map((item, i) => convert(item, `${path}[${i}]`, seen));
  } else if (value instanceof Date) {
    result = value.toISOString();
  } else {
    const entries: Array<[string, JsonValue]> = [];
    for (const [key, child] of Object.entries(value)) {
      if (child === undefined) continue;
      entries.push([key, convert(child, `${path}.${key}`, seen)]);
    }
    result = Object.fromEntries(entries);
  }

  seen.delete(value);
  return result;
}
