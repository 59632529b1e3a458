// Path: src/lib/obscure.ts
// Reversible obfuscation of single values (NOT encryption)
//
// Obscured values keep passwords from being read over someone's shoulder
// or in a screenshot. Anyone holding this source can reveal them: the key
// below ships with every installation. Use the crypt envelope for
// confidentiality.

import crypto from 'node:crypto';
import { NotObscuredError, extractErrorMessage } from '../utils/error.js';

/**
 * Fixed AES-256 key shared by every installation. Not configurable and
 * not a secret.
 */
export const OBSCURE_KEY: Buffer = Buffer.from(
  '5f1c8a93d27e4b06a9c3e8f1746d20bb93a5e17c4d8f02b6e1c7a9354f086d2e',
  'hex'
);

/** IV length, also the minimum decoded length of an obscured value */
export const OBSCURE_IV_SIZE = 16;

export const OBSCURE_SECURITY_NOTICE =
  'Obscured values are obfuscated, not encrypted: anyone with cfgvault can reveal them. ' +
  'Use `cfgvault encrypt set` to protect the files themselves.';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*={0,2}$/;

// Python-style printability: no control, format, unassigned, private-use
// or separator characters other than the plain space
const NON_PRINTABLE = /(?! )[\p{C}\p{Z}]/u;

const utf8 = new TextDecoder('utf-8', { fatal: true });

function ctr(data: Buffer, iv: Buffer): Buffer {
  const cipher = crypto.createCipheriv('aes-256-ctr', OBSCURE_KEY, iv);
  return Buffer.concat([cipher.update(data), cipher.final()]);
}

/**
 * Obscure a value: base64url(iv || AES-CTR(key, iv, utf8(value))), unpadded.
 * Output differs on every call for the same input.
 */
export function obscure(plaintext: string): string {
  if (!plaintext) {
    return '';
  }

  const iv = crypto.randomBytes(OBSCURE_IV_SIZE);
  const ciphertext = ctr(Buffer.from(plaintext, 'utf-8'), iv);
  return Buffer.concat([iv, ciphertext]).toString('base64url');
}

/**
 * Reverse `obscure`.
 *
 * @throws NotObscuredError if the value is not valid base64url, decodes to
 * fewer than 16 bytes, or does not decrypt to valid UTF-8
 */
export function reveal(obscured: string): string {
  if (!obscured) {
    return '';
  }

  const unpadded = obscured.replace(/=+$/, '');
  if (!BASE64URL_PATTERN.test(obscured) || unpadded.length % 4 === 1) {
    throw new NotObscuredError('Failed to reveal value - is it obscured? Invalid base64 encoding');
  }

  const decoded = Buffer.from(unpadded, 'base64url');
  if (decoded.length < OBSCURE_IV_SIZE) {
    throw new NotObscuredError('Failed to reveal value - is it obscured? Input too short');
  }

  const iv = decoded.subarray(0, OBSCURE_IV_SIZE);
  const plaintext = ctr(decoded.subarray(OBSCURE_IV_SIZE), iv);
  try {
    return utf8.decode(plaintext);
  } catch (err) {
    throw new NotObscuredError(`Failed to reveal value - is it obscured? ${extractErrorMessage(err)}`, {
      cause: err instanceof Error ? err : undefined,
    });
  }
}

export function isPrintable(value: string): boolean {
  return !NON_PRINTABLE.test(value);
}

/**
 * Heuristic: the value reveals cleanly and the result is printable.
 *
 * Best-effort only. Arbitrary strings that happen to decode and decrypt
 * to printable text are reported as obscured, and obscured values whose
 * plaintext contains control characters are not.
 */
export function isObscured(value: string): boolean {
  if (!value) {
    return false;
  }

  try {
    return isPrintable(reveal(value));
  } catch {
    return false;
  }
}
