// Path: src/lib/config/index.ts
// Public API for the configuration store

export type { ConfigManagerOptions, CopyOptions } from './types.js';
export { ENTRY_FILE_MODE, CONFIG_DIR_MODE } from './types.js';

export { ConfigEntry } from './entry.js';
export { ConfigManager, findEncryptedEntries } from './manager.js';
