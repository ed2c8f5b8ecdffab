/**
 * Run Command Tests
 * 2024-01-01 is a Monday.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'fs';

vi.mock('../../../../src/cli/utils/runtime', () => ({
  createRuntime: vi.fn(),
  requireRoot: vi.fn(),
}));

// Import after mocking
import { runCommand } from '../../../../src/cli/commands/run';
import { ExitCode } from '../../../../src/cli/types';
import { createRuntime } from '../../../../src/cli/utils/runtime';
import { FakeCommandRunner, macHandler } from '../../../helpers/fake-command-runner';
import { createWorkspace, fakeRuntime, writeConfig, type Workspace } from '../../../helpers/cli-fixtures';

describe('runCommand', () => {
  let mockExit: ReturnType<typeof vi.fn>;
  let workspace: Workspace;

  function useRunner(runner: FakeCommandRunner): void {
    vi.mocked(createRuntime).mockReturnValue(fakeRuntime(runner));
  }

  beforeEach(() => {
    vi.mocked(createRuntime).mockReset();
    mockExit = vi.fn();
    vi.spyOn(process, 'exit').mockImplementation(mockExit as unknown as typeof process.exit);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.useFakeTimers({ toFake: ['Date'] });
    workspace = createWorkspace();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    rmSync(workspace.dir, { recursive: true, force: true });
  });

  it('should start a block for the rest of the active interval', async () => {
    vi.setSystemTime(new Date(2024, 0, 1, 10, 0));
    writeConfig(workspace);
    const runner = new FakeCommandRunner(macHandler());
    useRunner(runner);

    await runCommand({ config: workspace.configPath });

    expect(mockExit).toHaveBeenCalledWith(ExitCode.SUCCESS);
    expect(runner.commandLines()).toContain(
      'sudo -u alice defaults write org.eyebeam.SelfControl BlockDuration -int 450'
    );
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Block started for 7h 30m'));
  });

  it('should exit cleanly at a stop instant', async () => {
    vi.setSystemTime(new Date(2024, 0, 1, 17, 30));
    writeConfig(workspace);
    const runner = new FakeCommandRunner(macHandler());
    useRunner(runner);

    await runCommand({ config: workspace.configPath });

    expect(mockExit).toHaveBeenCalledWith(ExitCode.SUCCESS);
    expect(runner.commandLines()).toEqual([
      'sudo -u alice defaults read org.eyebeam.SelfControl BlockStartedDate',
    ]);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('No schedule is active at the moment.'));
  });

  it('should leave a running block alone', async () => {
    vi.setSystemTime(new Date(2024, 0, 1, 10, 0));
    writeConfig(workspace);
    const runner = new FakeCommandRunner((command, args) =>
      command === 'sudo' && args.includes('read') ? { stdout: '2024-01-01 08:00:00 +0000\n' } : undefined
    );
    useRunner(runner);

    await runCommand({ config: workspace.configPath });

    expect(mockExit).toHaveBeenCalledWith(ExitCode.SUCCESS);
    expect(runner.calls).toHaveLength(1);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('SelfControl is already running.'));
  });

  it('should refuse an invalid schedule without calling SelfControl', async () => {
    vi.setSystemTime(new Date(2024, 0, 1, 10, 0));
    writeConfig(workspace, [
      { weekday: 1, 'start-hour': 10, 'start-minute': 0, 'end-hour': 10, 'end-minute': 0 },
    ]);
    const runner = new FakeCommandRunner(macHandler());
    useRunner(runner);

    await runCommand({ config: workspace.configPath });

    expect(mockExit).toHaveBeenCalledWith(ExitCode.CONFIG_ERROR);
    expect(runner.calls).toHaveLength(0);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Schedule #2 (Monday 10:00-10:00) starts and ends at the same time')
    );
  });

  it('should exit with INSTALL_FAILED when SelfControl cannot be launched', async () => {
    vi.setSystemTime(new Date(2024, 0, 1, 10, 0));
    writeConfig(workspace);
    const mac = macHandler();
    useRunner(
      new FakeCommandRunner((command, args) =>
        command.endsWith('org.eyebeam.SelfControl') ? { exitCode: 1, stderr: 'helper failed' } : mac(command, args)
      )
    );

    await runCommand({ config: workspace.configPath });

    expect(mockExit).toHaveBeenCalledWith(ExitCode.INSTALL_FAILED);
  });
});
