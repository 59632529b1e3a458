// Path: src/lib/formats/index.ts
// Format registry and detection

import fs from 'node:fs';
import { FormatError } from '../../utils/error.js';
import { IniFormat } from './ini.js';
import { TomlFormat } from './toml.js';
import type { ConfigFormat, FormatName } from './types.js';
import { YamlFormat } from './yaml.js';

export type { ConfigFormat, FormatName } from './types.js';
export { IniFormat } from './ini.js';
export { TomlFormat } from './toml.js';
export { YamlFormat } from './yaml.js';

export const FORMAT_NAMES: readonly FormatName[] = ['toml', 'ini', 'yaml'];

export const DEFAULT_FORMAT: FormatName = 'toml';

const FACTORIES: Record<FormatName, () => ConfigFormat> = {
  toml: () => new TomlFormat(),
  ini: () => new IniFormat(),
  yaml: () => new YamlFormat(),
};

export function isFormatName(value: string): value is FormatName {
  return (FORMAT_NAMES as readonly string[]).includes(value);
}

/**
 * Get a handler by format name.
 *
 * @throws FormatError for unknown names
 */
export function getFormat(name: string): ConfigFormat {
  if (!isFormatName(name)) {
    throw new FormatError(`Unsupported format: ${name}. Supported formats: ${FORMAT_NAMES.join(', ')}`);
  }
  return FACTORIES[name]();
}

/**
 * Every format whose heuristic accepts the text, in registry order.
 * More than one format can match the same text.
 */
export function detectFormats(text: string): FormatName[] {
  return FORMAT_NAMES.filter((name) => FACTORIES[name]().detect(text));
}

/**
 * Guess a directory's format from the extensions of the files it holds.
 * TOML wins over INI, INI over YAML; an empty or missing directory gives
 * the default format.
 */
export function detectDirectoryFormat(directory: string): FormatName {
  let files: string[];
  try {
    files = fs.readdirSync(directory);
  } catch {
    return DEFAULT_FORMAT;
  }

  if (files.some((f) => f.endsWith('.toml'))) return 'toml';
  if (files.some((f) => f.endsWith('.ini'))) return 'ini';
  if (files.some((f) => f.endsWith('.yaml') || f.endsWith('.yml'))) return 'yaml';
  return DEFAULT_FORMAT;
}
