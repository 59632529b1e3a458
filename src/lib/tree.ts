// Path: src/lib/tree.ts
// Config value model and dotted-path operations over it

import { FormatError, InvalidKeyError } from '../utils/error.js';

export type ConfigScalar = string | number | boolean;

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigMap;

export interface ConfigMap {
  [key: string]: ConfigValue;
}

export const PATH_SEPARATOR = '.';

const RESERVED_KEYS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Keys that plain-object assignment would route to the prototype chain.
 */
export function isReservedKey(key: string): boolean {
  return RESERVED_KEYS.has(key);
}

function assertSafeKey(key: string): void {
  if (RESERVED_KEYS.has(key)) {
    throw new InvalidKeyError(key);
  }
}

export function isConfigMap(value: unknown): value is ConfigMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function isScalar(value: unknown): value is ConfigScalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Split "database.primary.host" into its segments.
 */
export function splitPath(dottedPath: string): string[] {
  return dottedPath.split(PATH_SEPARATOR);
}

export function joinPath(segments: readonly string[]): string {
  return segments.join(PATH_SEPARATOR);
}

/**
 * Read the value at a segment path. Returns undefined when any segment is
 * missing or traverses through a non-map value.
 */
export function getAtPath(map: ConfigMap, segments: readonly string[]): ConfigValue | undefined {
  let current: ConfigValue = map;
  for (const segment of segments) {
    if (!isConfigMap(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Write a value at a segment path, creating intermediate maps and
 * replacing any non-map value found on the way.
 *
 * @throws InvalidKeyError if a segment is a reserved key
 */
export function setAtPath(map: ConfigMap, segments: readonly string[], value: ConfigValue): void {
  if (segments.length === 0) {
    throw new Error('Cannot set a value at an empty path');
  }
  segments.forEach(assertSafeKey);

  let current = map;
  for (const segment of segments.slice(0, -1)) {
    const next = Object.hasOwn(current, segment) ? current[segment] : undefined;
    if (isConfigMap(next)) {
      current = next;
    } else {
      const created: ConfigMap = {};
      current[segment] = created;
      current = created;
    }
  }
  current[segments[segments.length - 1]] = value;
}

/**
 * Remove the value at a segment path.
 *
 * @returns true if a value was removed
 */
export function unsetAtPath(map: ConfigMap, segments: readonly string[]): boolean {
  if (segments.length === 0) {
    return false;
  }

  const parent = getAtPath(map, segments.slice(0, -1));
  const last = segments[segments.length - 1];
  if (!isConfigMap(parent) || !Object.hasOwn(parent, last)) {
    return false;
  }
  delete parent[last];
  return true;
}

/**
 * Rebuild a map, passing every non-map leaf through `fn` together with its
 * segment path. Arrays are leaves.
 */
export function mapLeaves(
  map: ConfigMap,
  fn: (segments: readonly string[], value: ConfigScalar | ConfigValue[]) => ConfigValue,
  prefix: readonly string[] = []
): ConfigMap {
  const result: ConfigMap = {};
  for (const [key, value] of Object.entries(map)) {
    assertSafeKey(key);
    const segments = [...prefix, key];
    result[key] = isConfigMap(value) ? mapLeaves(value, fn, segments) : fn(segments, value);
  }
  return result;
}

/**
 * Flatten nested maps into dotted keys.
 *
 * @example
 * flatten({ db: { host: 'x', port: 1 } }) // { 'db.host': 'x', 'db.port': 1 }
 */
export function flatten(map: ConfigMap): Record<string, ConfigScalar | ConfigValue[]> {
  const result: Record<string, ConfigScalar | ConfigValue[]> = {};
  mapLeaves(map, (segments, value) => {
    result[joinPath(segments)] = value;
    return value;
  });
  return result;
}

export function cloneValue(value: ConfigValue): ConfigValue {
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (isConfigMap(value)) {
    return cloneMap(value);
  }
  return value;
}

/**
 * @throws InvalidKeyError if a key is reserved
 */
export function cloneMap(map: ConfigMap): ConfigMap {
  const result: ConfigMap = {};
  for (const [key, value] of Object.entries(map)) {
    assertSafeKey(key);
    result[key] = cloneValue(value);
  }
  return result;
}

function toConfigValue(value: unknown, segments: readonly string[]): ConfigValue {
  if (isScalar(value)) {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toConfigValue(item, [...segments, String(index)]));
  }
  if (isConfigMap(value)) {
    const result: ConfigMap = {};
    for (const [key, child] of Object.entries(value)) {
      if (RESERVED_KEYS.has(key)) {
        throw new FormatError(`Reserved key '${key}' at '${joinPath([...segments, key])}'`);
      }
      result[key] = toConfigValue(child, [...segments, key]);
    }
    return result;
  }
  const where = segments.length > 0 ? joinPath(segments) : '<root>';
  throw new FormatError(`Unsupported value at '${where}': ${value === null ? 'null' : typeof value}`);
}

/**
 * Normalise parser output into a ConfigMap.
 *
 * @throws FormatError if the root is not a mapping, a key is reserved
 * (`__proto__`, `constructor`, `prototype`), or a value has no counterpart
 * in the config value model (null, undefined, functions)
 */
export function toConfigMap(value: unknown): ConfigMap {
  if (!isConfigMap(value)) {
    throw new FormatError('Config root must be a mapping');
  }
  const result = toConfigValue(value, []);
  if (!isConfigMap(result)) {
    throw new FormatError('Config root must be a mapping');
  }
  return result;
}
