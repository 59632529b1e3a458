// Path: src/lib/formats/toml.ts
// TOML format handler

import { parse, stringify } from 'smol-toml';
import { FormatError, extractErrorMessage } from '../../utils/error.js';
import { toConfigMap, type ConfigMap } from '../tree.js';
import type { ConfigFormat, FormatName } from './types.js';

export class TomlFormat implements ConfigFormat {
  load(text: string): ConfigMap {
    let parsed: unknown;
    try {
      parsed = parse(text);
    } catch (err) {
      throw new FormatError(`Failed to parse TOML: ${extractErrorMessage(err)}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }
    return toConfigMap(parsed);
  }

  dump(data: ConfigMap): string {
    try {
      const text = stringify(data);
      return text.endsWith('\n') || text === '' ? text : `${text}\n`;
    } catch (err) {
      throw new FormatError(`Failed to serialize to TOML: ${extractErrorMessage(err)}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  getExtension(): string {
    return '.toml';
  }

  detect(text: string): boolean {
    if (!text.trim()) {
      return false;
    }
    try {
      parse(text);
      return true;
    } catch {
      return false;
    }
  }

  getName(): FormatName {
    return 'toml';
  }
}
