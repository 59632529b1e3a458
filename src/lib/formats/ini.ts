// Path: src/lib/formats/ini.ts
// INI format handler (two-level: sections -> keys -> string values)

import ini from 'ini';
import { FormatError, extractErrorMessage } from '../../utils/error.js';
import { isConfigMap, isReservedKey, type ConfigMap, type ConfigValue } from '../tree.js';
import type { ConfigFormat, FormatName } from './types.js';

function describe(value: ConfigValue): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

function leafToString(value: unknown): string {
  return Array.isArray(value) ? value.map((item) => String(item)).join(',') : String(value);
}

/**
 * Flatten the parser's nested section objects back into one level.
 * `[a.b]` is reported by the parser as { a: { b: {...} } } and comes back
 * out as the section "a.b".
 */
function collectSections(
  node: Record<string, unknown>,
  prefix: readonly string[],
  result: ConfigMap
): void {
  for (const [key, value] of Object.entries(node)) {
    if (isReservedKey(key)) {
      throw new FormatError(`Failed to parse INI: reserved name '${key}'`);
    }
    if (!isConfigMap(value)) {
      if (prefix.length === 0) {
        throw new FormatError(`Failed to parse INI: key '${key}' is not inside a [section]`);
      }
      continue;
    }

    const sectionName = [...prefix, key].join('.');
    const section: ConfigMap = {};
    let hasChildSections = false;
    for (const [field, fieldValue] of Object.entries(value)) {
      if (isReservedKey(field)) {
        throw new FormatError(`Failed to parse INI: reserved name '${field}'`);
      }
      if (isConfigMap(fieldValue)) {
        hasChildSections = true;
      } else {
        section[field] = leafToString(fieldValue);
      }
    }

    if (Object.keys(section).length > 0 || !hasChildSections) {
      result[sectionName] = section;
    }
    collectSections(value, [...prefix, key], result);
  }
}

/**
 * INI handler. Every loaded value is a string; values of other types are
 * written in their textual form, so round trips are not type-preserving.
 */
export class IniFormat implements ConfigFormat {
  load(text: string): ConfigMap {
    let parsed: unknown;
    try {
      parsed = ini.parse(text);
    } catch (err) {
      throw new FormatError(`Failed to parse INI: ${extractErrorMessage(err)}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }
    if (!isConfigMap(parsed)) {
      throw new FormatError('Failed to parse INI: unexpected parser output');
    }

    const result: ConfigMap = {};
    collectSections(parsed, [], result);
    return result;
  }

  dump(data: ConfigMap): string {
    const sections: Record<string, Record<string, string>> = {};

    for (const [sectionName, values] of Object.entries(data)) {
      if (!isConfigMap(values)) {
        throw new FormatError(
          `INI format requires nested structure: section '${sectionName}' contains ${describe(values)}, not a mapping`
        );
      }

      const section: Record<string, string> = {};
      for (const [key, value] of Object.entries(values)) {
        if (isConfigMap(value)) {
          throw new FormatError(
            `INI format supports only two levels: '${sectionName}.${key}' contains a mapping`
          );
        }
        section[key] = leafToString(value);
      }
      sections[sectionName] = section;
    }

    try {
      return ini.encode(sections, { whitespace: true });
    } catch (err) {
      throw new FormatError(`Failed to serialize to INI: ${extractErrorMessage(err)}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  getExtension(): string {
    return '.ini';
  }

  detect(text: string): boolean {
    if (!text.trim()) {
      return false;
    }
    try {
      return Object.keys(this.load(text)).length > 0;
    } catch {
      return false;
    }
  }

  getName(): FormatName {
    return 'ini';
  }
}
