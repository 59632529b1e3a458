// Path: src/lib/formats/yaml.ts
// YAML format handler

import yaml from 'js-yaml';
import { FormatError, extractErrorMessage } from '../../utils/error.js';
import { isConfigMap, toConfigMap, type ConfigMap } from '../tree.js';
import type { ConfigFormat, FormatName } from './types.js';

// Core schema: no implicit timestamps, so dates stay strings on both sides
const SCHEMA = yaml.CORE_SCHEMA;

export class YamlFormat implements ConfigFormat {
  load(text: string): ConfigMap {
    let parsed: unknown;
    try {
      parsed = yaml.load(text, { schema: SCHEMA });
    } catch (err) {
      throw new FormatError(`Failed to parse YAML: ${extractErrorMessage(err)}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }

    // An empty document is an empty config
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isConfigMap(parsed)) {
      throw new FormatError(`YAML root must be a mapping, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`);
    }
    return toConfigMap(parsed);
  }

  dump(data: ConfigMap): string {
    try {
      return yaml.dump(data, { schema: SCHEMA, sortKeys: false, lineWidth: -1, noRefs: true });
    } catch (err) {
      throw new FormatError(`Failed to serialize to YAML: ${extractErrorMessage(err)}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  getExtension(): string {
    return '.yaml';
  }

  detect(text: string): boolean {
    if (!text.trim()) {
      return false;
    }
    try {
      const parsed = yaml.load(text, { schema: SCHEMA });
      return isConfigMap(parsed) && Object.keys(parsed).length > 0;
    } catch {
      return false;
    }
  }

  getName(): FormatName {
    return 'yaml';
  }
}
