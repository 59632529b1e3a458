// Path: src/lib/config/entry.ts
// One named configuration with selective reveal of obscured values

import { NotObscuredError } from '../../utils/error.js';
import { isObscured, reveal } from '../obscure.js';
import {
  cloneMap,
  cloneValue,
  getAtPath,
  joinPath,
  mapLeaves,
  splitPath,
  type ConfigMap,
  type ConfigValue,
} from '../tree.js';

function revealOrKeep(value: string): string {
  try {
    return reveal(value);
  } catch (err) {
    if (err instanceof NotObscuredError) {
      return value;
    }
    throw err;
  }
}

export class ConfigEntry {
  readonly name: string;
  private readonly data: ConfigMap;
  private readonly sensitiveFields: ReadonlySet<string>;

  constructor(name: string, data: ConfigMap, sensitiveFields: Iterable<string> = []) {
    this.name = name;
    this.data = data;
    this.sensitiveFields = new Set(sensitiveFields);
  }

  /**
   * Read one value by dotted path.
   *
   * Only paths tracked as sensitive are revealed here; a value that fails
   * to reveal is returned as stored.
   */
  get(key: string): ConfigValue | undefined;
  get(key: string, defaultValue: ConfigValue): ConfigValue;
  get(key: string, defaultValue?: ConfigValue): ConfigValue | undefined {
    const value = getAtPath(this.data, splitPath(key));
    if (value === undefined) {
      return defaultValue;
    }

    if (typeof value === 'string' && this.sensitiveFields.has(key)) {
      return revealOrKeep(value);
    }
    return cloneValue(value);
  }

  /**
   * Copy of the whole mapping.
   *
   * With `revealSecrets`, every string leaf that is either tracked as
   * sensitive or looks obscured is revealed; unrevealable values pass
   * through unchanged. This is broader than `get`, which only looks at
   * tracked paths.
   */
  getAll(revealSecrets = true): ConfigMap {
    if (!revealSecrets) {
      return cloneMap(this.data);
    }

    return mapLeaves(this.data, (segments, value) => {
      if (typeof value !== 'string') {
        return Array.isArray(value) ? value.map(cloneValue) : value;
      }
      if (this.sensitiveFields.has(joinPath(segments)) || isObscured(value)) {
        return revealOrKeep(value);
      }
      return value;
    });
  }

  getSensitiveFields(): ReadonlySet<string> {
    return this.sensitiveFields;
  }
}
