// Path: src/lib/crypt.ts
// Whole-file authenticated encryption (XSalsa20-Poly1305 secretbox)
//
// File layout:
//   CFGVAULT_ENCRYPT_V0:
//   base64(nonce[24] || secretbox(plaintext))
//
// The key is SHA-256 over the salted password. There is no key stretching
// and no recovery: a lost password means lost data.

import crypto from 'node:crypto';
import inquirer from 'inquirer';
import nacl from 'tweetnacl';
import {
  DecryptionError,
  EncryptionError,
  InvalidEncodingError,
  InvalidPasswordError,
  MissingPayloadError,
  NotEncryptedError,
  PasswordUnavailableError,
  UnsupportedVersionError,
  CfgVaultError,
  extractErrorMessage,
} from '../utils/error.js';
import { runShellCommand } from '../utils/shell.js';
import { cryptLogger as log } from './logger.js';

export const ENCRYPTION_PREFIX = 'CFGVAULT_ENCRYPT_';
export const ENCRYPTION_HEADER = `${ENCRYPTION_PREFIX}V0:`;

export const NONCE_SIZE = nacl.secretbox.nonceLength;
export const MAC_SIZE = nacl.secretbox.overheadLength;

export const PASSWORD_SALT = '[cfgvault-secure]';

export const ENV_PASSWORD = 'CFGVAULT_PASSWORD';
export const ENV_PASSWORD_COMMAND = 'CFGVAULT_PASSWORD_COMMAND';
export const ENV_PASSWORD_CHANGE = 'CFGVAULT_PASSWORD_CHANGE';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

function toText(blob: Buffer | string): string {
  return typeof blob === 'string' ? blob : blob.toString('utf-8');
}

function nonBlankLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Derive the 32-byte secretbox key: SHA-256("[" + password + "]" + salt).
 *
 * @throws CfgVaultError for an empty password
 */
export function deriveKey(password: string): Buffer {
  if (!password) {
    throw new CfgVaultError('Password cannot be empty', 'EMPTY_PASSWORD');
  }
  return crypto.createHash('sha256').update(`[${password}]${PASSWORD_SALT}`, 'utf-8').digest();
}

/**
 * Seal `plaintext` under `password` with a fresh random nonce.
 *
 * @returns Header line, newline, base64 payload, newline
 * @throws EncryptionError on any failure, including an empty password
 */
export function encrypt(plaintext: Buffer | string, password: string): Buffer {
  try {
    const key = deriveKey(password);
    const message = typeof plaintext === 'string' ? Buffer.from(plaintext, 'utf-8') : plaintext;
    const nonce = nacl.randomBytes(NONCE_SIZE);
    const sealed = nacl.secretbox(message, nonce, key);
    const payload = Buffer.concat([nonce, sealed]).toString('base64');
    return Buffer.from(`${ENCRYPTION_HEADER}\n${payload}\n`, 'utf-8');
  } catch (err) {
    throw new EncryptionError(`Failed to encrypt config: ${extractErrorMessage(err)}`, {
      cause: err instanceof Error ? err : undefined,
    });
  }
}

/**
 * Open an envelope produced by `encrypt`.
 *
 * @throws NotEncryptedError - no lines, or first line lacks the prefix
 * @throws UnsupportedVersionError - prefixed header of another version
 * @throws MissingPayloadError - header without a payload line
 * @throws InvalidEncodingError - payload is not base64
 * @throws DecryptionError - payload too short, or the password is empty
 * @throws InvalidPasswordError - authentication failed (wrong password or tampering)
 */
export function decrypt(blob: Buffer | string, password: string): Buffer {
  const lines = nonBlankLines(toText(blob));

  if (lines.length === 0 || !lines[0].startsWith(ENCRYPTION_PREFIX)) {
    throw new NotEncryptedError();
  }

  if (lines[0] !== ENCRYPTION_HEADER) {
    const version = lines[0].includes(':') ? lines[0].split(':')[0] : 'unknown';
    throw new UnsupportedVersionError(version, ENCRYPTION_HEADER);
  }

  if (lines.length < 2) {
    throw new MissingPayloadError();
  }

  const encoded = lines[1];
  if (!BASE64_PATTERN.test(encoded) || encoded.length % 4 !== 0) {
    throw new InvalidEncodingError('payload is not valid base64');
  }
  const payload = Buffer.from(encoded, 'base64');

  if (payload.length < NONCE_SIZE + MAC_SIZE) {
    throw new DecryptionError(`Encrypted payload is too short (${payload.length} bytes)`);
  }

  let key: Buffer;
  try {
    key = deriveKey(password);
  } catch (err) {
    throw new DecryptionError(`Failed to decrypt config: ${extractErrorMessage(err)}`, {
      cause: err instanceof Error ? err : undefined,
    });
  }

  const nonce = payload.subarray(0, NONCE_SIZE);
  const opened = nacl.secretbox.open(payload.subarray(NONCE_SIZE), nonce, key);
  if (opened === null) {
    throw new InvalidPasswordError();
  }
  return Buffer.from(opened);
}

/**
 * True iff the first non-blank line is exactly the current header. Other
 * versions are not reported as encrypted by this probe.
 */
export function isEncrypted(blob: Buffer | string): boolean {
  const lines = nonBlankLines(toText(blob));
  return lines.length > 0 && lines[0] === ENCRYPTION_HEADER;
}

/**
 * Where `getPassword` looks for a password. Each source can be replaced,
 * which is how tests run without a terminal or a shell.
 */
export interface PasswordSources {
  env: NodeJS.ProcessEnv;
  runCommand: (command: string, env: NodeJS.ProcessEnv) => string;
  isInteractive: () => boolean;
  prompt: (message: string) => Promise<string>;
}

export interface GetPasswordOptions {
  /** Prompt shown for interactive input */
  prompt?: string;
  /** Set CFGVAULT_PASSWORD_CHANGE=1 for the password command */
  changing?: boolean;
  sources?: Partial<PasswordSources>;
}

async function promptForPassword(message: string): Promise<string> {
  const { password } = await inquirer.prompt<{ password: string }>([
    {
      type: 'password',
      name: 'password',
      message,
      mask: '*',
    },
  ]);
  return password;
}

export const defaultPasswordSources: PasswordSources = {
  env: process.env,
  runCommand: runShellCommand,
  isInteractive: () => Boolean(process.stdin.isTTY),
  prompt: promptForPassword,
};

/**
 * Resolve a password. First source that yields a non-empty value wins:
 *
 * 1. CFGVAULT_PASSWORD
 * 2. CFGVAULT_PASSWORD_COMMAND (trimmed stdout)
 * 3. Interactive prompt, only on a real terminal
 *
 * @throws PasswordUnavailableError if the command fails or nothing yields a password
 */
export async function getPassword(options: GetPasswordOptions = {}): Promise<string> {
  const sources: PasswordSources = { ...defaultPasswordSources, ...options.sources };
  const message = options.prompt ?? 'Config password:';

  const fromEnv = sources.env[ENV_PASSWORD];
  if (fromEnv) {
    log.debug({ source: 'env' }, 'Password resolved');
    return fromEnv;
  }

  const command = sources.env[ENV_PASSWORD_COMMAND];
  if (command) {
    const env: NodeJS.ProcessEnv = { ...sources.env };
    if (options.changing) {
      env[ENV_PASSWORD_CHANGE] = '1';
    }

    let output: string;
    try {
      output = sources.runCommand(command, env);
    } catch (err) {
      throw new PasswordUnavailableError(`Password command failed: ${extractErrorMessage(err)}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }

    const fromCommand = output.trim();
    if (fromCommand) {
      log.debug({ source: 'command' }, 'Password resolved');
      return fromCommand;
    }
  }

  if (sources.isInteractive()) {
    const fromPrompt = await sources.prompt(message);
    if (fromPrompt) {
      return fromPrompt;
    }
  }

  throw new PasswordUnavailableError('No password provided and cannot prompt (not a TTY)');
}

export interface PasswordCheck {
  password: string;
  warnings: string[];
}

/**
 * Validate a new password and normalise it (Unicode NFKC).
 *
 * @throws CfgVaultError for empty or whitespace-only passwords
 */
export function checkPassword(password: string): PasswordCheck {
  const warnings: string[] = [];

  if (!password) {
    throw new CfgVaultError('Password cannot be empty', 'EMPTY_PASSWORD');
  }

  const stripped = password.trim();
  if (!stripped) {
    throw new CfgVaultError('Password must contain at least one non-whitespace character', 'EMPTY_PASSWORD');
  }
  if (stripped !== password) {
    warnings.push('Password has leading/trailing whitespace (preserved)');
  }

  const normalized = password.normalize('NFKC');
  if (normalized !== password) {
    warnings.push('Password was normalized using Unicode NFKC');
  }

  return { password: normalized, warnings };
}
