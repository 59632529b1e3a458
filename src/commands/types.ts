// Path: src/commands/types.ts
// Type definitions for Commander.js command options

/**
 * Options every command accepts
 */
export interface StoreCommandOptions {
  configDir?: string;
  format?: string;
}

/**
 * Options for the 'init' command
 */
export interface InitCommandOptions extends StoreCommandOptions {
  encrypt?: boolean;
}

/**
 * Options for the 'list' command
 */
export interface ListCommandOptions extends StoreCommandOptions {
  json?: boolean;
  plain?: boolean;
}

/**
 * Options for the 'show' command
 */
export interface ShowCommandOptions extends StoreCommandOptions {
  reveal?: boolean;
  output?: string;
}

/**
 * Options for the 'create' command
 */
export interface CreateCommandOptions extends StoreCommandOptions {
  fromFile?: string;
  interactive: boolean;
}

/**
 * Options for the 'set' command
 */
export interface SetCommandOptions extends StoreCommandOptions {
  obscure?: boolean;
  create?: boolean;
}

/**
 * Options for the 'get' command
 */
export interface GetCommandOptions extends StoreCommandOptions {
  reveal?: boolean;
  default?: string;
}

/**
 * Options for the 'delete' and 'encrypt remove' commands
 */
export interface ConfirmCommandOptions extends StoreCommandOptions {
  yes?: boolean;
}

/**
 * Options for the 'copy' and 'rename' commands
 */
export interface CopyCommandOptions extends StoreCommandOptions {
  overwrite?: boolean;
}

/**
 * Options for the 'export' command
 */
export interface ExportCommandOptions extends StoreCommandOptions {
  output?: string;
  exportFormat: string;
  reveal?: boolean;
}

/**
 * Options for the 'import' command
 */
export interface ImportCommandOptions extends StoreCommandOptions {
  fromFile: string;
  importFormat?: string;
  overwrite?: boolean;
}

/**
 * Options for the 'export-env' command
 */
export interface ExportEnvCommandOptions extends StoreCommandOptions {
  prefix: string;
  reveal?: boolean;
  uppercase: boolean;
}

/**
 * Options for the 'validate' command
 */
export interface ValidateCommandOptions extends StoreCommandOptions {
  schema: string;
}
