// Path: src/utils/error.ts
// Error taxonomy and error handling utilities

/**
 * Extract error message from unknown error type.
 * Safely handles Error objects, strings, and other types.
 *
 * @param err - Unknown error value
 * @returns Error message string
 */
export function extractErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'string') {
    return err;
  }
  return String(err);
}

/**
 * Base error for everything the store raises, with a stable code.
 */
export class CfgVaultError extends Error {
  readonly code: string;
  readonly metadata?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      metadata?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'CfgVaultError';
    this.code = code;
    this.metadata = options?.metadata;

    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}

/**
 * Parsing or serialization failed, or the data has a shape the format
 * cannot represent.
 */
export class FormatError extends CfgVaultError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, 'FORMAT_ERROR', options);
    this.name = 'FormatError';
  }
}

export class EncryptionError extends CfgVaultError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, 'ENCRYPTION_ERROR', options);
    this.name = 'EncryptionError';
  }
}

/**
 * The blob could not be opened for a reason other than a wrong password.
 * Subclasses identify the exact envelope failure.
 */
export class DecryptionError extends CfgVaultError {
  constructor(message: string, options?: { cause?: Error; code?: string }) {
    super(message, options?.code ?? 'DECRYPTION_ERROR', { cause: options?.cause });
    this.name = 'DecryptionError';
  }
}

export class NotEncryptedError extends DecryptionError {
  constructor(message = 'Config is not encrypted (missing encryption header)') {
    super(message, { code: 'NOT_ENCRYPTED' });
    this.name = 'NotEncryptedError';
  }
}

export class UnsupportedVersionError extends DecryptionError {
  readonly version: string;

  constructor(version: string, expected: string) {
    super(`Unsupported encryption version: ${version}. Expected ${expected}`, {
      code: 'UNSUPPORTED_VERSION',
    });
    this.name = 'UnsupportedVersionError';
    this.version = version;
  }
}

export class MissingPayloadError extends DecryptionError {
  constructor() {
    super('No encrypted data found after header', { code: 'NO_PAYLOAD' });
    this.name = 'MissingPayloadError';
  }
}

export class InvalidEncodingError extends DecryptionError {
  constructor(message: string) {
    super(`Invalid base64 encoding: ${message}`, { code: 'INVALID_ENCODING' });
    this.name = 'InvalidEncodingError';
  }
}

/**
 * Authentication of the sealed payload failed: wrong password or
 * tampered data. Deliberately not a DecryptionError.
 */
export class InvalidPasswordError extends CfgVaultError {
  constructor(message = 'Invalid password or corrupted data') {
    super(message, 'INVALID_PASSWORD');
    this.name = 'InvalidPasswordError';
  }
}

export class PasswordUnavailableError extends CfgVaultError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, 'PASSWORD_UNAVAILABLE', options);
    this.name = 'PasswordUnavailableError';
  }
}

export class NotObscuredError extends CfgVaultError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, 'NOT_OBSCURED', options);
    this.name = 'NotObscuredError';
  }
}

export class ConfigNotFoundError extends CfgVaultError {
  readonly configName: string;

  constructor(configName: string) {
    super(`Config '${configName}' not found`, 'CONFIG_NOT_FOUND', { metadata: { name: configName } });
    this.name = 'ConfigNotFoundError';
    this.configName = configName;
  }
}

export class ConfigExistsError extends CfgVaultError {
  readonly configName: string;

  constructor(configName: string) {
    super(`Config '${configName}' already exists`, 'CONFIG_EXISTS', { metadata: { name: configName } });
    this.name = 'ConfigExistsError';
    this.configName = configName;
  }
}

/**
 * The entry's file exists but could not be loaded, so it must not be
 * overwritten or re-encrypted blindly. `cause` holds the load error.
 */
export class UnreadableConfigError extends CfgVaultError {
  readonly configName: string;

  constructor(configName: string, cause: Error) {
    super(`Config '${configName}' could not be loaded: ${cause.message}`, 'CONFIG_UNREADABLE', {
      cause,
      metadata: { name: configName },
    });
    this.name = 'UnreadableConfigError';
    this.configName = configName;
  }
}

export class InvalidNameError extends CfgVaultError {
  constructor(message: string) {
    super(message, 'INVALID_NAME');
    this.name = 'InvalidNameError';
  }
}

/**
 * A key path segment that would reach an object's prototype
 * (`__proto__`, `constructor`, `prototype`).
 */
export class InvalidKeyError extends CfgVaultError {
  readonly key: string;

  constructor(key: string) {
    super(`Invalid key '${key}': reserved name`, 'INVALID_KEY', { metadata: { key } });
    this.name = 'InvalidKeyError';
    this.key = key;
  }
}

/**
 * One field that failed schema validation.
 */
export interface FieldError {
  field: string;
  message: string;
  value?: unknown;
}

export class SchemaValidationError extends CfgVaultError {
  readonly errors: readonly FieldError[];

  constructor(errors: readonly FieldError[]) {
    const summary = errors.map((e) => `${e.field}: ${e.message}`).join('; ');
    super(`Schema validation failed: ${summary}`, 'SCHEMA_VALIDATION');
    this.name = 'SchemaValidationError';
    this.errors = errors;
  }
}

/**
 * Wrap an unknown error into a CfgVaultError.
 * Errors that already belong to the taxonomy pass through unchanged.
 *
 * @param err - Unknown error value
 * @param code - Error code
 * @param metadata - Additional metadata
 * @returns CfgVaultError instance
 */
export function wrapError(
  err: unknown,
  code: string,
  metadata?: Record<string, unknown>
): CfgVaultError {
  if (err instanceof CfgVaultError) {
    return err;
  }
  const message = extractErrorMessage(err);
  const cause = err instanceof Error ? err : undefined;

  return new CfgVaultError(message, code, { cause, metadata });
}
