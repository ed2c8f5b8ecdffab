/**
 * Tests for LaunchdStore
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { LaunchdStore } from '@/lib/scheduler/launchd-store';
import { AppError, ErrorCode } from '@/lib/errors';
import { FakeCommandRunner } from '../../../helpers/fake-command-runner';

describe('LaunchdStore', () => {
  let dir: string;
  let plistPath: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'weekblock-launchd-'));
    plistPath = path.join(dir, 'com.weekblock.scheduler.plist');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('install', () => {
    it('should write and load a new definition', async () => {
      const runner = new FakeCommandRunner();
      const store = new LaunchdStore(plistPath, runner);

      const result = await store.install('<plist/>\n');

      expect(result).toEqual({ replaced: false, plistPath });
      expect(readFileSync(plistPath, 'utf-8')).toBe('<plist/>\n');
      expect(runner.commandLines()).toEqual([`launchctl load -w ${plistPath}`]);
    });

    it('should unload the previous definition before loading the new one', async () => {
      writeFileSync(plistPath, '<old/>\n');
      const runner = new FakeCommandRunner();
      const store = new LaunchdStore(plistPath, runner);

      const result = await store.install('<new/>\n');

      expect(result.replaced).toBe(true);
      expect(readFileSync(plistPath, 'utf-8')).toBe('<new/>\n');
      expect(runner.commandLines()).toEqual([
        `launchctl unload -w ${plistPath}`,
        `launchctl load -w ${plistPath}`,
      ]);
    });

    it('should fail with COMMAND_FAILED when launchctl refuses the job', async () => {
      const runner = new FakeCommandRunner((_command, args) =>
        args[0] === 'load' ? { exitCode: 5, stderr: 'Load failed: 5: Input/output error\n' } : undefined
      );
      const store = new LaunchdStore(plistPath, runner);

      const error = await store.install('<plist/>\n').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(AppError);
      expect(error).toHaveProperty('code', ErrorCode.COMMAND_FAILED);
      expect(error).toHaveProperty('message', 'launchctl exited with code 5: Load failed: 5: Input/output error');
    });

    it('should fail with FILESYSTEM_ERROR when the file cannot be written', async () => {
      const store = new LaunchdStore(path.join(dir, 'missing', 'job.plist'), new FakeCommandRunner());

      await expect(store.install('<plist/>\n')).rejects.toHaveProperty('code', ErrorCode.FILESYSTEM_ERROR);
    });
  });

  describe('uninstall', () => {
    it('should report false when nothing is installed', async () => {
      const runner = new FakeCommandRunner();

      await expect(new LaunchdStore(plistPath, runner).uninstall()).resolves.toBe(false);
      expect(runner.calls).toEqual([]);
    });

    it('should remove the file even when the job was not loaded', async () => {
      writeFileSync(plistPath, '<plist/>\n');
      const runner = new FakeCommandRunner(() => ({ exitCode: 1, stderr: 'Could not find specified service' }));

      await expect(new LaunchdStore(plistPath, runner).uninstall()).resolves.toBe(true);
      expect(existsSync(plistPath)).toBe(false);
    });
  });

  describe('readInstalled', () => {
    it('should return null without a definition and the contents otherwise', () => {
      const store = new LaunchdStore(plistPath, new FakeCommandRunner());
      expect(store.readInstalled()).toBeNull();

      writeFileSync(plistPath, '<plist/>\n');
      expect(store.isInstalled()).toBe(true);
      expect(store.readInstalled()).toBe('<plist/>\n');
    });
  });
});
