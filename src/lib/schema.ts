// Path: src/lib/schema.ts
// Field declarations, validation with type coercion, and sensitive paths

import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import {
  CfgVaultError,
  SchemaValidationError,
  extractErrorMessage,
  type FieldError,
} from '../utils/error.js';
import {
  cloneMap,
  getAtPath,
  isConfigMap,
  isScalar,
  setAtPath,
  splitPath,
  type ConfigMap,
  type ConfigScalar,
  type ConfigValue,
} from './tree.js';

export type FieldType = 'string' | 'integer' | 'float' | 'boolean';

export interface FieldDef {
  type: FieldType;
  /** Injected when the field is absent and not required */
  default?: ConfigScalar;
  required: boolean;
  /** Obscured on write and revealed on read */
  sensitive: boolean;
  description: string;
}

/** Field declarations keyed by dotted path ("database.password") */
export type FieldDefs = Record<string, FieldDef>;

export interface SchemaValidationResult {
  valid: boolean;
  data: ConfigMap;
  errors: FieldError[];
}

type Coercion = { ok: true; value: ConfigScalar } | { ok: false; message: string };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

function coerceString(value: ConfigScalar): Coercion {
  return { ok: true, value: typeof value === 'string' ? value : String(value) };
}

function coerceInteger(value: ConfigScalar): Coercion {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return { ok: true, value };
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    return { ok: true, value: Number.parseInt(value.trim(), 10) };
  }
  return { ok: false, message: 'Input should be a valid integer' };
}

function coerceFloat(value: ConfigScalar): Coercion {
  if (typeof value === 'number') {
    return { ok: true, value };
  }
  if (typeof value === 'string' && FLOAT_PATTERN.test(value.trim())) {
    return { ok: true, value: Number.parseFloat(value.trim()) };
  }
  return { ok: false, message: 'Input should be a valid number' };
}

function coerceBoolean(value: ConfigScalar): Coercion {
  if (typeof value === 'boolean') {
    return { ok: true, value };
  }
  if (typeof value === 'number' && (value === 0 || value === 1)) {
    return { ok: true, value: value === 1 };
  }
  if (typeof value === 'string') {
    const word = value.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return { ok: true, value: true };
    if (FALSE_WORDS.has(word)) return { ok: true, value: false };
  }
  return { ok: false, message: 'Input should be a valid boolean' };
}

const COERCERS: Record<FieldType, (value: ConfigScalar) => Coercion> = {
  string: coerceString,
  integer: coerceInteger,
  float: coerceFloat,
  boolean: coerceBoolean,
};

/**
 * Coerce one present value to its declared type.
 */
export function coerceValue(type: FieldType, value: ConfigValue): Coercion {
  if (!isScalar(value)) {
    return { ok: false, message: `Expected ${type}, got ${Array.isArray(value) ? 'array' : 'mapping'}` };
  }
  return COERCERS[type](value);
}

/**
 * Validate `data` against field declarations without throwing.
 *
 * Declared fields are checked in declaration order: missing + required is
 * an error, missing + optional gets its default, present values are
 * coerced. Undeclared fields pass through untouched.
 */
export function validateData(fields: FieldDefs, data: ConfigMap): SchemaValidationResult {
  const result = cloneMap(data);
  const errors: FieldError[] = [];

  for (const [field, def] of Object.entries(fields)) {
    const segments = splitPath(field);
    const current = getAtPath(result, segments);

    if (current === undefined) {
      if (def.required) {
        errors.push({ field, message: 'Field required' });
      } else if (def.default !== undefined) {
        setAtPath(result, segments, def.default);
      }
      continue;
    }

    const coerced = coerceValue(def.type, current);
    if (coerced.ok) {
      setAtPath(result, segments, coerced.value);
    } else {
      errors.push({ field, message: coerced.message, value: current });
    }
  }

  return { valid: errors.length === 0, data: result, errors };
}

export class ConfigSchema {
  private readonly fields: FieldDefs;

  constructor(fields: FieldDefs) {
    this.fields = { ...fields };
  }

  /**
   * Validate and fill defaults.
   *
   * @returns A new mapping; the input is not modified
   * @throws SchemaValidationError listing every failing field
   */
  validate(data: ConfigMap): ConfigMap {
    const result = this.check(data);
    if (!result.valid) {
      throw new SchemaValidationError(result.errors);
    }
    return result.data;
  }

  /**
   * Validate without throwing.
   */
  check(data: ConfigMap): SchemaValidationResult {
    return validateData(this.fields, data);
  }

  /** Dotted paths of every field declared sensitive */
  getSensitiveFields(): Set<string> {
    return new Set(
      Object.entries(this.fields)
        .filter(([, def]) => def.sensitive)
        .map(([field]) => field)
    );
  }

  getFields(): Readonly<FieldDefs> {
    return this.fields;
  }
}

/**
 * Shorthand for building a schema: every flag defaults to off, type to string.
 */
export function createSchema(
  fields: Record<string, Partial<FieldDef>>
): ConfigSchema {
  const defs: FieldDefs = {};
  for (const [name, def] of Object.entries(fields)) {
    defs[name] = {
      type: def.type ?? 'string',
      default: def.default,
      required: def.required ?? false,
      sensitive: def.sensitive ?? false,
      description: def.description ?? '',
    };
  }
  return new ConfigSchema(defs);
}

const TYPE_ALIASES: Record<string, FieldType> = {
  str: 'string',
  string: 'string',
  int: 'integer',
  integer: 'integer',
  float: 'float',
  number: 'float',
  bool: 'boolean',
  boolean: 'boolean',
};

/**
 * Build a schema from an external definition:
 *
 * ```yaml
 * fields:
 *   host: { type: str, default: localhost }
 *   password: { type: str, sensitive: true, required: true }
 * ```
 *
 * Unrecognised type names fall back to string.
 *
 * @throws CfgVaultError if the definition has no `fields` mapping or a
 * field entry is malformed
 */
export function parseSchemaDefinition(raw: unknown): ConfigSchema {
  const fields = isConfigMap(raw) ? raw.fields : undefined;
  if (!isConfigMap(fields)) {
    throw new CfgVaultError("Schema definition must contain a 'fields' mapping", 'INVALID_SCHEMA');
  }

  const defs: FieldDefs = {};
  for (const [name, declared] of Object.entries(fields)) {
    if (!isConfigMap(declared)) {
      throw new CfgVaultError(`Schema field '${name}' must be a mapping`, 'INVALID_SCHEMA');
    }

    const rawType: unknown = declared.type;
    const typeName = typeof rawType === 'string' ? rawType.toLowerCase() : 'string';
    const description: unknown = declared.description;
    let defaultValue: ConfigScalar | undefined;
    const candidate: unknown = declared.default;
    if (candidate !== undefined && candidate !== null) {
      if (!isScalar(candidate)) {
        throw new CfgVaultError(`Schema field '${name}' has a non-scalar default`, 'INVALID_SCHEMA');
      }
      defaultValue = candidate;
    }

    defs[name] = {
      type: Object.hasOwn(TYPE_ALIASES, typeName) ? TYPE_ALIASES[typeName] : 'string',
      default: defaultValue,
      required: declared.required === true,
      sensitive: declared.sensitive === true,
      description: typeof description === 'string' ? description : '',
    };
  }
  return new ConfigSchema(defs);
}

function parseSchemaText(content: string, filePath: string): unknown {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.json') {
    return JSON.parse(content);
  }
  if (ext === '.yaml' || ext === '.yml') {
    return yaml.load(content, { schema: yaml.CORE_SCHEMA });
  }
  try {
    return JSON.parse(content);
  } catch {
    return yaml.load(content, { schema: yaml.CORE_SCHEMA });
  }
}

/**
 * Load a schema definition from a JSON or YAML file.
 */
export function loadSchemaFile(filePath: string): ConfigSchema {
  let raw: unknown;
  try {
    raw = parseSchemaText(fs.readFileSync(filePath, 'utf-8'), filePath);
  } catch (err) {
    throw new CfgVaultError(`Failed to read schema file ${filePath}: ${extractErrorMessage(err)}`, 'INVALID_SCHEMA', {
      cause: err instanceof Error ? err : undefined,
    });
  }
  return parseSchemaDefinition(raw);
}
