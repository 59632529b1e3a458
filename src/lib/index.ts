// Path: src/lib/index.ts
// Library entry point

export * from './config/index.js';
export * from './formats/index.js';
export {
  OBSCURE_KEY,
  OBSCURE_IV_SIZE,
  OBSCURE_SECURITY_NOTICE,
  obscure,
  reveal,
  isObscured,
  isPrintable,
} from './obscure.js';
export {
  ENCRYPTION_HEADER,
  ENCRYPTION_PREFIX,
  NONCE_SIZE,
  MAC_SIZE,
  PASSWORD_SALT,
  ENV_PASSWORD,
  ENV_PASSWORD_COMMAND,
  ENV_PASSWORD_CHANGE,
  deriveKey,
  encrypt,
  decrypt,
  isEncrypted,
  getPassword,
  checkPassword,
  defaultPasswordSources,
  type PasswordSources,
  type GetPasswordOptions,
  type PasswordCheck,
} from './crypt.js';
export {
  ConfigSchema,
  coerceValue,
  createSchema,
  loadSchemaFile,
  parseSchemaDefinition,
  validateData,
  type FieldDef,
  type FieldDefs,
  type FieldType,
  type SchemaValidationResult,
} from './schema.js';
export type { ConfigMap, ConfigScalar, ConfigValue } from './tree.js';
export {
  CfgVaultError,
  ConfigExistsError,
  ConfigNotFoundError,
  DecryptionError,
  EncryptionError,
  FormatError,
  InvalidEncodingError,
  InvalidKeyError,
  InvalidNameError,
  InvalidPasswordError,
  MissingPayloadError,
  NotEncryptedError,
  NotObscuredError,
  PasswordUnavailableError,
  SchemaValidationError,
  UnreadableConfigError,
  UnsupportedVersionError,
  type FieldError,
} from '../utils/error.js';
