// Path: src/lib/crypt.test.ts
// Tests for the encryption envelope and password resolution

import { describe, it, expect, vi } from 'vitest';
import crypto from 'node:crypto';
import {
  CfgVaultError,
  DecryptionError,
  EncryptionError,
  InvalidEncodingError,
  InvalidPasswordError,
  MissingPayloadError,
  NotEncryptedError,
  PasswordUnavailableError,
  UnsupportedVersionError,
} from '../utils/error.js';
import {
  ENCRYPTION_HEADER,
  ENV_PASSWORD,
  ENV_PASSWORD_CHANGE,
  ENV_PASSWORD_COMMAND,
  MAC_SIZE,
  NONCE_SIZE,
  checkPassword,
  decrypt,
  deriveKey,
  encrypt,
  getPassword,
  isEncrypted,
  type PasswordSources,
} from './crypt.js';

const PASSWORD = 'test-secret';

describe('deriveKey', () => {
  it('should hash the bracketed password with the salt', () => {
    const expected = crypto.createHash('sha256').update('[test-secret][cfgvault-secure]').digest();

    expect(deriveKey(PASSWORD).equals(expected)).toBe(true);
    expect(deriveKey(PASSWORD).length).toBe(32);
  });

  it('should reject an empty password', () => {
    expect(() => deriveKey('')).toThrow(CfgVaultError);
  });
});

describe('encrypt', () => {
  it('should write the header line and one base64 payload line', () => {
    const lines = encrypt('name = "app"\n', PASSWORD).toString('utf-8').split('\n');

    expect(lines[0]).toBe(ENCRYPTION_HEADER);
    expect(lines[1]).toMatch(/^[A-Za-z0-9+/]+={0,2}$/);
    expect(lines[2]).toBe('');
    expect(lines).toHaveLength(3);
  });

  it('should carry nonce, MAC and ciphertext in the payload', () => {
    const payload = encrypt('12345', PASSWORD).toString('utf-8').split('\n')[1];

    expect(Buffer.from(payload, 'base64').length).toBe(NONCE_SIZE + MAC_SIZE + 5);
  });

  it('should use a fresh nonce every time', () => {
    expect(encrypt('same', PASSWORD).equals(encrypt('same', PASSWORD))).toBe(false);
  });

  it('should wrap failures in EncryptionError', () => {
    expect(() => encrypt('data', '')).toThrow(EncryptionError);
    expect(() => encrypt('data', '')).toThrow('Failed to encrypt config: Password cannot be empty');
  });
});

describe('decrypt', () => {
  it('should open what encrypt sealed', () => {
    const blob = encrypt('[server]\nport = 8080\n', PASSWORD);

    expect(decrypt(blob, PASSWORD).toString('utf-8')).toBe('[server]\nport = 8080\n');
    expect(decrypt(blob.toString('utf-8'), PASSWORD).toString('utf-8')).toBe('[server]\nport = 8080\n');
  });

  it('should handle empty plaintext', () => {
    expect(decrypt(encrypt('', PASSWORD), PASSWORD).length).toBe(0);
  });

  it('should raise InvalidPasswordError, not DecryptionError, for a wrong password', () => {
    const blob = encrypt('data', PASSWORD);

    let caught: unknown;
    try {
      decrypt(blob, 'other-secret');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(InvalidPasswordError);
    expect(caught).not.toBeInstanceOf(DecryptionError);
  });

  it('should detect tampering', () => {
    const [header, payload] = encrypt('data', PASSWORD).toString('utf-8').split('\n');
    const bytes = Buffer.from(payload, 'base64');
    bytes[bytes.length - 1] ^= 0x01;

    expect(() => decrypt(`${header}\n${bytes.toString('base64')}\n`, PASSWORD)).toThrow(InvalidPasswordError);
  });

  it('should reject text without the header', () => {
    expect(() => decrypt('name = "app"', PASSWORD)).toThrow(NotEncryptedError);
    expect(() => decrypt('', PASSWORD)).toThrow('Config is not encrypted (missing encryption header)');
  });

  it('should report the version of a foreign header', () => {
    let caught: unknown;
    try {
      decrypt('CFGVAULT_ENCRYPT_V1:\nAAAA\n', PASSWORD);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(UnsupportedVersionError);
    expect(caught).toBeInstanceOf(DecryptionError);
    expect(caught instanceof UnsupportedVersionError && caught.version).toBe('CFGVAULT_ENCRYPT_V1');
  });

  it('should reject a header with no payload', () => {
    expect(() => decrypt(`${ENCRYPTION_HEADER}\n\n`, PASSWORD)).toThrow(MissingPayloadError);
  });

  it('should reject a payload that is not base64', () => {
    expect(() => decrypt(`${ENCRYPTION_HEADER}\n!!not-base64!!\n`, PASSWORD)).toThrow(InvalidEncodingError);
  });

  it('should reject a payload shorter than nonce and MAC', () => {
    const short = Buffer.alloc(10).toString('base64');

    expect(() => decrypt(`${ENCRYPTION_HEADER}\n${short}\n`, PASSWORD)).toThrow(
      'Encrypted payload is too short (10 bytes)'
    );
  });

  it('should reject an empty password as a DecryptionError', () => {
    const blob = encrypt('data', PASSWORD);

    expect(() => decrypt(blob, '')).toThrow(DecryptionError);
  });
});

describe('isEncrypted', () => {
  it('should look at the first non-blank line only', () => {
    expect(isEncrypted(encrypt('data', PASSWORD))).toBe(true);
    expect(isEncrypted(`\n\n${ENCRYPTION_HEADER}\nAAAA\n`)).toBe(true);
    expect(isEncrypted('CFGVAULT_ENCRYPT_V1:\nAAAA\n')).toBe(false);
    expect(isEncrypted('name = "app"')).toBe(false);
    expect(isEncrypted('')).toBe(false);
  });
});

function sources(overrides: Partial<PasswordSources>): Partial<PasswordSources> {
  return {
    env: {},
    runCommand: vi.fn(() => ''),
    isInteractive: () => false,
    prompt: vi.fn(async () => ''),
    ...overrides,
  };
}

describe('getPassword', () => {
  it('should prefer the environment variable', async () => {
    const runCommand = vi.fn(() => 'from-command');

    const password = await getPassword({
      sources: sources({ env: { [ENV_PASSWORD]: 'from-env', [ENV_PASSWORD_COMMAND]: 'cmd' }, runCommand }),
    });

    expect(password).toBe('from-env');
    expect(runCommand).not.toHaveBeenCalled();
  });

  it('should use trimmed command output', async () => {
    const runCommand = vi.fn(() => '  from-command\n');

    const password = await getPassword({
      sources: sources({ env: { [ENV_PASSWORD_COMMAND]: 'pass show cfg' }, runCommand }),
    });

    expect(password).toBe('from-command');
    expect(runCommand).toHaveBeenCalledWith('pass show cfg', { [ENV_PASSWORD_COMMAND]: 'pass show cfg' });
  });

  it('should flag a password change to the command', async () => {
    const runCommand = vi.fn(() => 'new-secret');

    await getPassword({
      changing: true,
      sources: sources({ env: { [ENV_PASSWORD_COMMAND]: 'cmd' }, runCommand }),
    });

    expect(runCommand).toHaveBeenCalledWith('cmd', { [ENV_PASSWORD_COMMAND]: 'cmd', [ENV_PASSWORD_CHANGE]: '1' });
  });

  it('should surface command failures', async () => {
    const runCommand = vi.fn((): string => {
      throw new Error('exit code 2');
    });

    await expect(
      getPassword({ sources: sources({ env: { [ENV_PASSWORD_COMMAND]: 'cmd' }, runCommand }) })
    ).rejects.toThrow('Password command failed: exit code 2');
  });

  it('should fall through to the prompt when the command prints nothing', async () => {
    const prompt = vi.fn(async () => 'typed');

    const password = await getPassword({
      prompt: 'Vault password:',
      sources: sources({ env: { [ENV_PASSWORD_COMMAND]: 'cmd' }, isInteractive: () => true, prompt }),
    });

    expect(password).toBe('typed');
    expect(prompt).toHaveBeenCalledWith('Vault password:');
  });

  it('should fail without any source and no terminal', async () => {
    await expect(getPassword({ sources: sources({}) })).rejects.toThrow(PasswordUnavailableError);
    await expect(getPassword({ sources: sources({}) })).rejects.toThrow(
      'No password provided and cannot prompt (not a TTY)'
    );
  });
});

describe('checkPassword', () => {
  it('should accept a plain password without warnings', () => {
    expect(checkPassword(PASSWORD)).toEqual({ password: PASSWORD, warnings: [] });
  });

  it('should warn about surrounding whitespace and keep it', () => {
    expect(checkPassword(' padded ')).toEqual({
      password: ' padded ',
      warnings: ['Password has leading/trailing whitespace (preserved)'],
    });
  });

  it('should normalise to NFKC', () => {
    const result = checkPassword('\ufb01le');

    expect(result.password).toBe('file');
    expect(result.warnings).toEqual(['Password was normalized using Unicode NFKC']);
  });

  it('should reject empty and whitespace-only passwords', () => {
    expect(() => checkPassword('')).toThrow('Password cannot be empty');
    expect(() => checkPassword('   ')).toThrow('Password must contain at least one non-whitespace character');
  });
});
