// Path: src/lib/formats/types.ts
// Format handler contract

import type { ConfigMap } from '../tree.js';

export type FormatName = 'toml' | 'ini' | 'yaml';

/**
 * Bidirectional text <-> mapping serialization for one file format.
 *
 * `detect` is a best-effort heuristic: the same text may be accepted by
 * more than one format.
 */
export interface ConfigFormat {
  /** Parse text; throws FormatError carrying the parser diagnostic */
  load(text: string): ConfigMap;
  /** Serialize a mapping; throws FormatError for shapes the format cannot hold */
  dump(data: ConfigMap): string;
  /** File extension including the leading dot */
  getExtension(): string;
  detect(text: string): boolean;
  getName(): FormatName;
}
