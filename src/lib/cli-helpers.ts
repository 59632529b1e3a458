// Path: src/lib/cli-helpers.ts
// Value parsing, rendering and conversion used by the command-line surface

import path from 'node:path';
import { CfgVaultError, FormatError, extractErrorMessage } from '../utils/error.js';
import { getFormat, isFormatName, type FormatName } from './formats/index.js';
import { flatten, isConfigMap, toConfigMap, type ConfigMap, type ConfigValue } from './tree.js';

/** Formats accepted by import/export: the store formats plus JSON */
export type ExchangeFormat = FormatName | 'json';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a command-line value: integer, then float, then true/yes and
 * false/no (any case), else the string as given. "1" and "0" are integers.
 */
export function parseValue(raw: string): string | number | boolean {
  const trimmed = raw.trim();

  if (INTEGER_PATTERN.test(trimmed)) {
    const parsed = Number.parseInt(trimmed, 10);
    if (Number.isSafeInteger(parsed)) {
      return parsed;
    }
  }
  if (FLOAT_PATTERN.test(trimmed)) {
    return Number.parseFloat(trimmed);
  }

  const lower = trimmed.toLowerCase();
  if (lower === 'true' || lower === 'yes') return true;
  if (lower === 'false' || lower === 'no') return false;

  return raw;
}

export interface Assignment {
  key: string;
  value: string;
}

/**
 * Split `key=value` at the first "=". Key and value are trimmed.
 *
 * @throws CfgVaultError if there is no "=" or the key is empty
 */
export function parseAssignment(assignment: string): Assignment {
  const index = assignment.indexOf('=');
  const key = index === -1 ? '' : assignment.slice(0, index).trim();
  if (!key) {
    throw new CfgVaultError(`Invalid assignment '${assignment}'. Use key=value format`, 'INVALID_ASSIGNMENT');
  }
  return { key, value: assignment.slice(index + 1).trim() };
}

/**
 * Single-quote a value for POSIX shells.
 *
 * @example
 * shellQuote("it's") // 'it'\''s'
 */
export function shellQuote(value: string): string {
  return `'${value.replaceAll("'", "'\\''")}'`;
}

/** Text form of a value: scalars as-is, arrays and mappings as JSON */
export function formatValue(value: ConfigValue): string {
  if (Array.isArray(value) || isConfigMap(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}

export interface EnvExportOptions {
  prefix?: string;
  uppercase?: boolean;
}

/**
 * `export KEY='value'` lines for every leaf. Nested keys are joined with
 * "_" and the prefix is prepended verbatim.
 *
 * @example
 * toEnvLines({ db: { host: 'x' } }, { prefix: 'APP_' }) // ["export APP_DB_HOST='x'"]
 */
export function toEnvLines(data: ConfigMap, options: EnvExportOptions = {}): string[] {
  const prefix = options.prefix ?? '';
  const uppercase = options.uppercase ?? true;

  return Object.entries(flatten(data)).map(([key, value]) => {
    const envKey = key.replaceAll('.', '_');
    return `export ${prefix}${uppercase ? envKey.toUpperCase() : envKey}=${shellQuote(formatValue(value))}`;
  });
}

/**
 * Indented `key: value` lines; nested mappings get a `key:` header line.
 */
export function prettyLines(data: ConfigMap, indent = 0): string[] {
  const pad = '  '.repeat(indent);
  const lines: string[] = [];

  for (const [key, value] of Object.entries(data)) {
    if (isConfigMap(value)) {
      lines.push(`${pad}${key}:`);
      lines.push(...prettyLines(value, indent + 1));
    } else {
      lines.push(`${pad}${key}: ${formatValue(value)}`);
    }
  }
  return lines;
}

/**
 * @throws FormatError for names outside json/toml/ini/yaml
 */
export function toExchangeFormat(name: string): ExchangeFormat {
  const lower = name.toLowerCase();
  if (lower === 'json' || isFormatName(lower)) {
    return lower;
  }
  if (lower === 'yml') {
    return 'yaml';
  }
  throw new FormatError(`Unsupported format: ${name}. Supported formats: json, toml, ini, yaml`);
}

/** Format implied by a file's extension; JSON when unknown */
export function exchangeFormatFromPath(filePath: string): ExchangeFormat {
  switch (path.extname(filePath).toLowerCase()) {
    case '.toml':
      return 'toml';
    case '.ini':
      return 'ini';
    case '.yaml':
    case '.yml':
      return 'yaml';
    default:
      return 'json';
  }
}

/**
 * @throws FormatError if the text does not parse to a mapping
 */
export function parseExchange(content: string, format: ExchangeFormat): ConfigMap {
  if (format !== 'json') {
    return getFormat(format).load(content);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new FormatError(`Failed to parse JSON: ${extractErrorMessage(err)}`, {
      cause: err instanceof Error ? err : undefined,
    });
  }
  return toConfigMap(parsed);
}

export function serializeExchange(data: ConfigMap, format: ExchangeFormat): string {
  if (format === 'json') {
    return `${JSON.stringify(data, null, 2)}\n`;
  }
  return getFormat(format).dump(data);
}
