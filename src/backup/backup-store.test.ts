import { describe, expect, it, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, utimes, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { Logger } from '../utils/logger.js';
import { PayloadDecoder } from '../store/payload.js';
import { BackupStore, compareBackupNames, formatBackupTimestamp } from './backup-store.js';

interface TestConfig {
  version: string;
  configId: string;
  testSetting: string;
  numericSetting: number;
}

const defaultConfig: TestConfig = {
  version: '1.0',
  configId: 'test',
  testSetting: 'default',
  numericSetting: 42,
};

describe('BackupStore', () => {
  let testDir: string;
  let configFile: string;
  let backupDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `backup-store-test-${randomUUID()}`);
    configFile = join(testDir, 'config.jsonc');
    backupDir = join(testDir, 'backups');
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  function createStore(
    now?: () => Date,
    maxBackups = 50
  ): BackupStore<TestConfig> {
    const logger = new Logger({ component: 'BackupStore' });
    return new BackupStore({
      configId: 'test',
      configFile,
      backupDir,
      fileExtension: 'jsonc',
      maxBackups,
      decoder: new PayloadDecoder({ defaultConfig, logger }),
      logger,
      now,
    });
  }

  function ticking(start: Date): () => Date {
    let offset = 0;
    return () => new Date(start.getTime() + 1000 * offset++);
  }

  describe('formatBackupTimestamp', () => {
    it('should format local time as yyyyMMdd_HHmmss', () => {
      expect(formatBackupTimestamp(new Date(2024, 0, 20, 12, 0, 0))).toBe('20240120_120000');
      expect(formatBackupTimestamp(new Date(2023, 11, 5, 7, 8, 9))).toBe('20231205_070809');
    });
  });

  describe('snapshot', () => {
    it('should copy the live file under a reason-tagged name', async () => {
      await writeFile(configFile, '{ invalid json }');
      const store = createStore(() => new Date(2024, 0, 20, 12, 0, 0));

      const backupPath = await store.snapshot('json_error');

      expect(backupPath).toBe(join(backupDir, 'test_json_error_20240120_120000.jsonc'));
      expect(await readFile(join(backupDir, 'test_json_error_20240120_120000.jsonc'), 'utf-8')).toBe(
        '{ invalid json }'
      );
    });

    it('should keep only the newest names once the cap is exceeded', async () => {
      await writeFile(configFile, '{}');
      const store = createStore(ticking(new Date(2024, 0, 20, 12, 0, 0)));

      for (let i = 0; i < 55; i++) {
        await store.snapshot('parse_error');
      }

      const names = await store.listBackups();
      expect(names).toHaveLength(50);
      expect(names[0]).toBe('test_parse_error_20240120_120054.jsonc');
      expect(names[49]).toBe('test_parse_error_20240120_120005.jsonc');
    });

    it('should honour a smaller cap', async () => {
      await writeFile(configFile, '{}');
      const store = createStore(ticking(new Date(2024, 0, 20, 12, 0, 0)), 2);

      await store.snapshot('a');
      await store.snapshot('a');
      await store.snapshot('a');

      expect(await store.listBackups()).toEqual([
        'test_a_20240120_120002.jsonc',
        'test_a_20240120_120001.jsonc',
      ]);
    });

    it('should evict by timestamp, not by reason, when reasons are mixed', async () => {
      await writeFile(configFile, '{}');
      const store = createStore(ticking(new Date(2024, 0, 1, 0, 0, 0)));

      for (let i = 0; i < 50; i++) {
        await store.snapshot('pre_migration');
      }
      const backupPath = await store.snapshot('empty_file');

      const names = await store.listBackups();
      expect(backupPath).toBe(join(backupDir, 'test_empty_file_20240101_000050.jsonc'));
      expect(names).toHaveLength(50);
      expect(names[0]).toBe('test_empty_file_20240101_000050.jsonc');
      expect(names[1]).toBe('test_pre_migration_20240101_000049.jsonc');
      expect(names[49]).toBe('test_pre_migration_20240101_000001.jsonc');
    });

    it('should keep the snapshot just written when timestamps collide', async () => {
      await writeFile(configFile, '{}');
      const store = createStore(() => new Date(2024, 0, 1, 0, 0, 0), 1);

      await store.snapshot('reload_error');
      const backupPath = await store.snapshot('empty_file');

      expect(backupPath).toBe(join(backupDir, 'test_empty_file_20240101_000000.jsonc'));
      expect(await store.listBackups()).toEqual(['test_empty_file_20240101_000000.jsonc']);
    });

    it('should return undefined when the live file is missing', async () => {
      const store = createStore();

      expect(await store.snapshot('reload_error')).toBeUndefined();
    });
  });

  describe('listBackups', () => {
    it('should return an empty list without a backup directory', async () => {
      expect(await createStore().listBackups()).toEqual([]);
    });

    it('should order by the timestamp in the name, newest first', async () => {
      await mkdir(backupDir);
      await writeFile(join(backupDir, 'test_reload_error_20240101_000000.jsonc'), '{}');
      await writeFile(join(backupDir, 'test_empty_file_20240102_000000.jsonc'), '{}');
      await writeFile(join(backupDir, 'test_pre_migration_20231231_235959.jsonc'), '{}');
      await writeFile(join(backupDir, 'stray.jsonc'), '{}');

      expect(await createStore().listBackups()).toEqual([
        'test_empty_file_20240102_000000.jsonc',
        'test_reload_error_20240101_000000.jsonc',
        'test_pre_migration_20231231_235959.jsonc',
        'stray.jsonc',
      ]);
    });

    it('should break timestamp ties by name', () => {
      const names = ['test_a_20240101_000000.jsonc', 'test_b_20240101_000000.jsonc'];

      expect([...names].sort(compareBackupNames)).toEqual([
        'test_b_20240101_000000.jsonc',
        'test_a_20240101_000000.jsonc',
      ]);
    });

    it('should ignore files with other extensions', async () => {
      await mkdir(backupDir);
      await writeFile(join(backupDir, 'test_a_20240101_000000.jsonc'), '{}');
      await writeFile(join(backupDir, 'notes.txt'), 'x');

      expect(await createStore().listBackups()).toEqual(['test_a_20240101_000000.jsonc']);
    });
  });

  describe('restoreLatestValid', () => {
    it('should return undefined without a backup directory', async () => {
      expect(await createStore().restoreLatestValid()).toBeUndefined();
    });

    it('should decode the most recently modified snapshot', async () => {
      await mkdir(backupDir);
      const older = join(backupDir, 'test_z_20240101_000000.jsonc');
      const newer = join(backupDir, 'test_a_20240101_000000.jsonc');
      await writeFile(older, '{"version":"1.0","configId":"test","numericSetting":1}');
      await writeFile(
        newer,
        '/* CONFIG_SECTION */\n{\n  // kept\n  "version": "1.0",\n  "configId": "test",\n  "numericSetting": 2,\n}\n/* END_CONFIG_SECTION */\n'
      );
      await utimes(older, new Date(2024, 0, 1), new Date(2024, 0, 1));
      await utimes(newer, new Date(2024, 0, 2), new Date(2024, 0, 2));

      const restored = await createStore().restoreLatestValid();

      expect(restored).toEqual({ ...defaultConfig, numericSetting: 2 });
    });

    it('should read a snapshot whose string values hold comment markers', async () => {
      await mkdir(backupDir);
      await writeFile(
        join(backupDir, 'test_a_20240101_000000.jsonc'),
        '/* CONFIG_SECTION */\n{\n  "version": "1.0",\n  "configId": "test",\n  "testSetting": "logs/*.log"\n}\n/* END_CONFIG_SECTION */\n'
      );

      const restored = await createStore().restoreLatestValid();

      expect(restored?.testSetting).toBe('logs/*.log');
    });

    it('should return undefined when the newest snapshot is corrupt', async () => {
      await mkdir(backupDir);
      const valid = join(backupDir, 'test_a_20240101_000000.jsonc');
      const corrupt = join(backupDir, 'test_b_20240101_000000.jsonc');
      await writeFile(valid, '{"version":"1.0","configId":"test"}');
      await writeFile(corrupt, '{ invalid json }');
      await utimes(valid, new Date(2024, 0, 1), new Date(2024, 0, 1));
      await utimes(corrupt, new Date(2024, 0, 2), new Date(2024, 0, 2));

      expect(await createStore().restoreLatestValid()).toBeUndefined();
    });

    it('should return undefined for a snapshot with nothing but comments', async () => {
      await mkdir(backupDir);
      await writeFile(join(backupDir, 'test_a_20240101_000000.jsonc'), '// nothing here\n');

      expect(await createStore().restoreLatestValid()).toBeUndefined();
    });
  });
});
