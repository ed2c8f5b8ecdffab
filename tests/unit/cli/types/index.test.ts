/**
 * CLI Types Tests
 */

import { describe, it, expect } from 'vitest';
import { ExitCode, exitCodeFor, isPreviewFormat } from '../../../../src/cli/types';
import {
  AppError,
  ConfigError,
  ErrorCode,
  InternalConsistencyFault,
  OverlapError,
  PermissionError,
} from '../../../../src/lib/errors';

const source = { entry: 1, weekday: null, startHour: 9, startMinute: 0, endHour: 10, endMinute: 0 };

describe('ExitCode', () => {
  it('should keep the documented values', () => {
    expect(ExitCode.SUCCESS).toBe(0);
    expect(ExitCode.CONFIG_ERROR).toBe(2);
    expect(ExitCode.INSTALL_FAILED).toBe(3);
    expect(ExitCode.PERMISSION_ERROR).toBe(4);
    expect(ExitCode.UNEXPECTED_ERROR).toBe(99);
  });
});

describe('exitCodeFor', () => {
  it('should map configuration problems to CONFIG_ERROR', () => {
    expect(exitCodeFor(new ConfigError('Invalid configuration'))).toBe(ExitCode.CONFIG_ERROR);
    expect(exitCodeFor(new OverlapError(source, { ...source, entry: 2 }, 'Monday'))).toBe(ExitCode.CONFIG_ERROR);
  });

  it('should map permission problems to PERMISSION_ERROR', () => {
    expect(exitCodeFor(new PermissionError('Please run this command as root'))).toBe(ExitCode.PERMISSION_ERROR);
  });

  it('should map failed commands and file writes to INSTALL_FAILED', () => {
    expect(exitCodeFor(new AppError(ErrorCode.COMMAND_FAILED, 'launchctl exited'))).toBe(ExitCode.INSTALL_FAILED);
    expect(exitCodeFor(new AppError(ErrorCode.FILESYSTEM_ERROR, 'EACCES'))).toBe(ExitCode.INSTALL_FAILED);
  });

  it('should treat internal faults and foreign errors as unexpected', () => {
    expect(exitCodeFor(new InternalConsistencyFault('Interval 0 starts outside the week'))).toBe(
      ExitCode.UNEXPECTED_ERROR
    );
    expect(exitCodeFor(new TypeError('x is undefined'))).toBe(ExitCode.UNEXPECTED_ERROR);
  });
});

describe('isPreviewFormat', () => {
  it('should accept the known formats only', () => {
    expect(['table', 'json', 'plist', 'crontab'].every(isPreviewFormat)).toBe(true);
    expect(isPreviewFormat('yaml')).toBe(false);
    expect(isPreviewFormat(undefined)).toBe(false);
  });
});
