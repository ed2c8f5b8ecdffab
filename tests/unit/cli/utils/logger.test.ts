/**
 * CLI Logger Tests
 * Tests for CLILogger with colored output
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CLILogger } from '../../../../src/cli/utils/logger';

describe('CLILogger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('without colors', () => {
    const logger = new CLILogger({ color: false });

    it('should prefix info, success and warn on stdout', () => {
      logger.info('Schedule installed');
      logger.success('Block started for 6h');
      logger.warn('Could not open an editor');

      expect(vi.mocked(console.log).mock.calls).toEqual([
        ['[INFO] Schedule installed'],
        ['[✓] Block started for 6h'],
        ['[WARN] Could not open an editor'],
      ]);
    });

    it('should write errors to stderr', () => {
      logger.error('Invalid configuration');

      expect(console.error).toHaveBeenCalledWith('[ERROR] Invalid configuration');
      expect(console.log).not.toHaveBeenCalled();
    });

    it('should underline headers', () => {
      logger.header('weekblock status');

      expect(vi.mocked(console.log).mock.calls).toEqual([['weekblock status'], ['================']]);
    });

    it('should align field values', () => {
      logger.fields([
        ['Scheduler', 'not installed'],
        ['User', 'alice'],
      ]);

      expect(vi.mocked(console.log).mock.calls).toEqual([['Scheduler: not installed'], ['User:      alice']]);
    });
  });

  describe('with colors', () => {
    it('should wrap prefixes in ANSI codes', () => {
      new CLILogger({ color: true }).info('Test');

      expect(console.log).toHaveBeenCalledWith('\x1b[34m[INFO]\x1b[0m Test');
    });
  });

  describe('debug', () => {
    it('should stay silent unless verbose', () => {
      new CLILogger({ color: false }).debug('hidden');
      new CLILogger({ color: false, verbose: true }).debug('shown');

      expect(vi.mocked(console.log).mock.calls).toEqual([['[DEBUG] shown']]);
    });
  });
});
