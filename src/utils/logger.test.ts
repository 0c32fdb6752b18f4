import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger, createDefaultLogger } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];
  let originalWrite: typeof process.stderr.write;

  beforeEach(() => {
    capturedOutput = [];
    originalWrite = process.stderr.write.bind(process.stderr);
    process.stderr.write = vi.fn((chunk: string | Uint8Array): boolean => {
      capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    }) as typeof process.stderr.write;
  });

  afterEach(() => {
    process.stderr.write = originalWrite;
  });

  function getOutput(index: number): string {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return output;
  }

  function parseOutput(index: number): Record<string, unknown> {
    return JSON.parse(getOutput(index).trim()) as Record<string, unknown>;
  }

  describe('unserializable data', () => {
    it('should fall back to an error entry for circular references', () => {
      const logger = new Logger({ component: 'ConfigStore' });

      const circular: Record<string, unknown> = { name: 'settings' };
      circular.self = circular;

      expect(() => {
        logger.info('circular_data', circular);
      }).not.toThrow();

      expect(capturedOutput).toHaveLength(1);
      const parsed = parseOutput(0);
      expect(parsed.level).toBe('info');
      expect(parsed.component).toBe('ConfigStore');
      expect(parsed.event).toBe('circular_data');
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.originalData).toBe('[unserializable]');
      expect(parsed.data).toBeUndefined();
    });

    it('should fall back to an error entry for BigInt values', () => {
      const logger = new Logger({ component: 'BackupStore' });

      logger.warn('bigint_data', { size: BigInt(42) });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('warn');
      expect(parsed.serializationError).toBeDefined();
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('should write exactly one line per entry', () => {
      const logger = new Logger({ component: 'ConfigStore' });

      const circular: Record<string, unknown> = {};
      circular.ref = circular;
      logger.error('circular_error', circular);

      const output = getOutput(0);
      expect(output.endsWith('\n')).toBe(true);
      expect(output.trim().split('\n')).toHaveLength(1);
    });

    it('should emit parseable JSON for arbitrary data (property-based)', () => {
      const logger = new Logger({ component: 'PropertyTest' });

      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.jsonValue()), (data) => {
          capturedOutput = [];

          logger.info('fuzz_event', data);

          expect(capturedOutput).toHaveLength(1);
          const parsed = parseOutput(0);
          expect(parsed.event).toBe('fuzz_event');
          expect(parsed.component).toBe('PropertyTest');
        })
      );
    });
  });

  describe('levels', () => {
    it('should log info entries with data', () => {
      const logger = new Logger({ component: 'ConfigStore' });

      logger.info('config_reloaded', { configId: 'main' });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('info');
      expect(parsed.event).toBe('config_reloaded');
      expect(parsed.data).toEqual({ configId: 'main' });
      expect(parsed.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
    });

    it('should omit the data field when no data is given', () => {
      const logger = new Logger({ component: 'ConfigStore' });

      logger.info('watcher_started');

      expect(parseOutput(0)).not.toHaveProperty('data');
    });

    it('should suppress debug entries unless debug mode is on', () => {
      const quiet = new Logger({ component: 'ConfigStore' });
      quiet.debug('reload_skipped');
      expect(capturedOutput).toHaveLength(0);

      const verbose = new Logger({ component: 'ConfigStore', debugMode: true });
      verbose.debug('reload_skipped');
      expect(capturedOutput).toHaveLength(1);
      expect(parseOutput(0).level).toBe('debug');
    });

    it('should log warn and error entries', () => {
      const logger = new Logger({ component: 'ConfigStore' });

      logger.warn('backup_unusable', { file: 'main_json_error_20240120_120000.jsonc' });
      logger.error('save_failed', { message: 'EACCES' });

      expect(parseOutput(0).level).toBe('warn');
      expect(parseOutput(1).level).toBe('error');
      expect(parseOutput(1).data).toEqual({ message: 'EACCES' });
    });
  });

  describe('child', () => {
    it('should use the child component name and inherit debug mode', () => {
      const parent = new Logger({ component: 'ConfigStore', debugMode: true });
      const child = parent.child('AutoSaver');

      child.debug('tick_skipped');

      expect(child.isDebugEnabled).toBe(true);
      expect(parseOutput(0).component).toBe('AutoSaver');
    });
  });

  describe('createDefaultLogger', () => {
    it('should create a ConfigStore logger with debug disabled by default', () => {
      const logger = createDefaultLogger();

      logger.info('store_initialized');

      expect(logger.isDebugEnabled).toBe(false);
      expect(parseOutput(0).component).toBe('ConfigStore');
    });
  });
});
