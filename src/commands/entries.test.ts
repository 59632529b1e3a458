// Path: src/commands/entries.test.ts
// Tests for the list and delete commands

import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigManager } from '../lib/config/index.js';
import { registerEntryCommands } from './entries.js';

describe('entry commands', () => {
  let settingsHome: string;
  let previousXdg: string | undefined;
  let previousPassword: string | undefined;
  let dir: string;

  beforeAll(() => {
    settingsHome = fs.mkdtempSync(path.join(os.tmpdir(), 'cfgvault-home-'));
    previousXdg = process.env.XDG_CONFIG_HOME;
    process.env.XDG_CONFIG_HOME = settingsHome;
  });

  afterAll(() => {
    if (previousXdg === undefined) {
      delete process.env.XDG_CONFIG_HOME;
    } else {
      process.env.XDG_CONFIG_HOME = previousXdg;
    }
    fs.rmSync(settingsHome, { recursive: true, force: true });
  });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cfgvault-cli-'));
    previousPassword = process.env.CFGVAULT_PASSWORD;
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    if (previousPassword === undefined) {
      delete process.env.CFGVAULT_PASSWORD;
    } else {
      process.env.CFGVAULT_PASSWORD = previousPassword;
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function run(...args: string[]): Promise<void> {
    const program = new Command();
    program.exitOverride();
    registerEntryCommands(program);
    await program.parseAsync([...args, '--config-dir', dir, '--format', 'toml'], { from: 'user' });
  }

  function listed(): unknown {
    const [output] = vi.mocked(console.log).mock.calls[0] ?? [];
    return JSON.parse(String(output));
  }

  describe('list', () => {
    it('should report the encryption of each file', async () => {
      new ConfigManager({ directory: dir, password: 'test-secret' }).addConfig('locked', { v: 1 });
      fs.writeFileSync(path.join(dir, 'open.toml'), 'v = 2\n');
      process.env.CFGVAULT_PASSWORD = 'test-secret';

      await run('list', '--json');

      expect(listed()).toEqual([
        { name: 'locked', encrypted: true },
        { name: 'open', encrypted: false },
      ]);
    });

    it('should include entries that failed to load with their error', async () => {
      fs.writeFileSync(path.join(dir, 'bad.toml'), '[broken');
      fs.writeFileSync(path.join(dir, 'good.toml'), 'ok = true\n');

      await run('list', '--json');

      expect(listed()).toEqual([
        { name: 'bad', encrypted: false, error: expect.stringMatching(/^Failed to parse TOML: /) },
        { name: 'good', encrypted: false },
      ]);
      expect(vi.mocked(console.error)).toHaveBeenCalledWith(expect.anything(), 'Could not load: bad');
    });

    it('should fail when the password does not open every entry', async () => {
      new ConfigManager({ directory: dir, password: 'test-secret' }).addConfig('locked', { v: 1 });
      process.env.CFGVAULT_PASSWORD = 'other-secret';

      await run('list', '--json');

      expect(vi.mocked(console.error)).toHaveBeenCalledWith(
        expect.anything(),
        'Invalid password: could not decrypt locked'
      );
      expect(process.exitCode).toBe(1);
    });
  });

  describe('delete', () => {
    it('should delete an entry that failed to load', async () => {
      fs.writeFileSync(path.join(dir, 'bad.toml'), '[broken');

      await run('delete', 'bad', '--yes');

      expect(fs.existsSync(path.join(dir, 'bad.toml'))).toBe(false);
      expect(process.exitCode).toBeUndefined();
    });

    it('should report a missing entry', async () => {
      await run('delete', 'ghost', '--yes');

      expect(vi.mocked(console.error)).toHaveBeenCalledWith(expect.anything(), "Config 'ghost' not found");
      expect(process.exitCode).toBe(1);
    });
  });
});
