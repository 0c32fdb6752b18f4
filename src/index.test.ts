import { describe, it, expect, afterEach } from 'vitest';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { VERSION, ConfigSettingsError, Logger, openConfigStore } from './index.js';

describe('jsonc-config-keeper', () => {
  const dirs: string[] = [];

  afterEach(async () => {
    for (const dir of dirs.splice(0)) {
      await rm(dir, { recursive: true, force: true });
    }
  });

  describe('VERSION', () => {
    it('should match package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  it('should open, edit, save and reopen a config through the package entry point', async () => {
    const configDir = join(tmpdir(), `config-keeper-${randomUUID()}`);
    dirs.push(configDir);
    const options = {
      currentVersion: '2.0',
      defaultConfig: { version: '2.0', configId: 'app', port: 8080, hosts: ['localhost'] },
      configDir,
      env: {},
      logger: new Logger({ component: 'ConfigStore' }),
    };

    const first = await openConfigStore(options);
    await first.save({ ...first.getCurrentConfig(), port: 9090 });
    await first.cleanup();

    const second = await openConfigStore(options);
    expect(second.getCurrentConfig()).toEqual({
      version: '2.0',
      configId: 'app',
      port: 9090,
      hosts: ['localhost'],
    });
    await second.cleanup();
  });

  it('should surface invalid settings as ConfigSettingsError', async () => {
    await expect(
      openConfigStore({
        currentVersion: '1.0',
        defaultConfig: { version: '1.0', configId: '../escape' },
        configDir: tmpdir(),
        env: {},
      })
    ).rejects.toBeInstanceOf(ConfigSettingsError);
  });
});
