/**
 * Activate Command Tests
 * 2024-01-01 is a Monday.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, rmSync } from 'fs';

vi.mock('../../../../src/cli/utils/runtime', () => ({
  createRuntime: vi.fn(),
  requireRoot: vi.fn(),
}));

// Import after mocking
import { activateCommand } from '../../../../src/cli/commands/activate';
import { ExitCode } from '../../../../src/cli/types';
import { createRuntime, requireRoot } from '../../../../src/cli/utils/runtime';
import { PermissionError } from '../../../../src/lib/errors';
import { FakeCommandRunner, macHandler } from '../../../helpers/fake-command-runner';
import { createWorkspace, fakeRuntime, writeConfig, type Workspace } from '../../../helpers/cli-fixtures';

const DEFAULTS = 'sudo -u alice defaults';

describe('activateCommand', () => {
  let mockExit: ReturnType<typeof vi.fn>;
  let workspace: Workspace;

  function useRunner(runner: FakeCommandRunner): void {
    vi.mocked(createRuntime).mockReturnValue(fakeRuntime(runner));
  }

  beforeEach(() => {
    vi.mocked(createRuntime).mockReset();
    vi.mocked(requireRoot).mockReset();
    mockExit = vi.fn();
    vi.spyOn(process, 'exit').mockImplementation(mockExit as unknown as typeof process.exit);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(2024, 0, 1, 10, 0));
    workspace = createWorkspace();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    rmSync(workspace.dir, { recursive: true, force: true });
  });

  describe('successful activation', () => {
    it('should install the job and start the active block', async () => {
      writeConfig(workspace);
      const runner = new FakeCommandRunner(macHandler());
      useRunner(runner);

      await activateCommand({ config: workspace.configPath, plist: workspace.plistPath });

      expect(mockExit).toHaveBeenCalledWith(ExitCode.SUCCESS);
      expect(runner.commandLines()).toEqual([
        'dscl . list /Users',
        `launchctl load -w ${workspace.plistPath}`,
        `${DEFAULTS} read org.eyebeam.SelfControl BlockStartedDate`,
        `${DEFAULTS} write org.eyebeam.SelfControl BlockDuration -int 450`,
        `${DEFAULTS} write org.eyebeam.SelfControl BlockAsWhitelist -bool false`,
        `${DEFAULTS} write org.eyebeam.SelfControl HostBlacklist -array news.example.com`,
        'id -u alice',
        `${workspace.appPath}/Contents/MacOS/org.eyebeam.SelfControl 501 --install`,
      ]);
    });

    it('should write a plist that runs this CLI with the same config', async () => {
      writeConfig(workspace);
      useRunner(new FakeCommandRunner(macHandler()));

      await activateCommand({ config: workspace.configPath, plist: workspace.plistPath });

      const plist = readFileSync(workspace.plistPath, 'utf-8');
      expect(plist).toContain(
        `    <string>run</string>\n    <string>--config</string>\n    <string>${workspace.configPath}</string>\n`
      );
      expect(plist).toContain(
        '      <key>Weekday</key>\n      <integer>1</integer>\n      <key>Hour</key>\n      <integer>9</integer>\n'
      );
    });

    it('should only install when no schedule is active', async () => {
      vi.setSystemTime(new Date(2024, 0, 1, 8, 0));
      writeConfig(workspace);
      const runner = new FakeCommandRunner(macHandler());
      useRunner(runner);

      await activateCommand({ config: workspace.configPath, plist: workspace.plistPath });

      expect(mockExit).toHaveBeenCalledWith(ExitCode.SUCCESS);
      expect(existsSync(workspace.plistPath)).toBe(true);
      expect(runner.commandLines().some((line) => line.includes('defaults write'))).toBe(false);
      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('No schedule is active at the moment.'));
    });
  });

  describe('failures', () => {
    it('should exit with PERMISSION_ERROR when not root', async () => {
      vi.mocked(requireRoot).mockImplementation(() => {
        throw new PermissionError('Please run this command as root: sudo weekblock activate');
      });

      await activateCommand({ config: workspace.configPath, plist: workspace.plistPath });

      expect(mockExit).toHaveBeenCalledWith(ExitCode.PERMISSION_ERROR);
      expect(createRuntime).not.toHaveBeenCalled();
    });

    it('should not touch the scheduler for an unknown user', async () => {
      writeConfig(workspace);
      const runner = new FakeCommandRunner(macHandler(['bob']));
      useRunner(runner);

      await activateCommand({ config: workspace.configPath, plist: workspace.plistPath });

      expect(mockExit).toHaveBeenCalledWith(ExitCode.CONFIG_ERROR);
      expect(runner.commandLines()).toEqual(['dscl . list /Users']);
      expect(existsSync(workspace.plistPath)).toBe(false);
    });

    it('should not touch the scheduler for overlapping schedules', async () => {
      writeConfig(workspace, [
        { weekday: 'monday', 'start-hour': 17, 'start-minute': 0, 'end-hour': 18, 'end-minute': 0 },
      ]);
      const runner = new FakeCommandRunner(macHandler());
      useRunner(runner);

      await activateCommand({ config: workspace.configPath, plist: workspace.plistPath });

      expect(mockExit).toHaveBeenCalledWith(ExitCode.CONFIG_ERROR);
      expect(console.error).toHaveBeenCalledWith(
        expect.stringContaining(
          'Schedule #1 (Monday 09:00-17:30) overlaps schedule #2 (Monday 17:00-18:00) on Monday'
        )
      );
      expect(existsSync(workspace.plistPath)).toBe(false);
    });

    it('should exit with CONFIG_ERROR when the config file is missing', async () => {
      useRunner(new FakeCommandRunner(macHandler()));

      await activateCommand({ config: workspace.configPath, plist: workspace.plistPath });

      expect(mockExit).toHaveBeenCalledWith(ExitCode.CONFIG_ERROR);
    });

    it('should exit with INSTALL_FAILED when launchctl refuses the job', async () => {
      writeConfig(workspace);
      const mac = macHandler();
      const runner = new FakeCommandRunner((command, args) =>
        command === 'launchctl' ? { exitCode: 1, stderr: 'Load failed' } : mac(command, args)
      );
      useRunner(runner);

      await activateCommand({ config: workspace.configPath, plist: workspace.plistPath });

      expect(mockExit).toHaveBeenCalledTimes(1);
      expect(mockExit).toHaveBeenCalledWith(ExitCode.INSTALL_FAILED);
      expect(runner.commandLines().some((line) => line.includes('defaults'))).toBe(false);
    });
  });
});
