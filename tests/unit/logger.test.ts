/**
 * Tests for electron-log configuration
 */
import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_SETTINGS } from '@shared/index';

const electronLog = vi.hoisted(() => {
  const scoped = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  const fileTransport: { level: string | false; resolvePathFn: () => string } = {
    level: 'silly',
    resolvePathFn: () => '',
  };
  const consoleTransport: { level: string | false; writeFn: (options: { message: { data: unknown[] } }) => void } = {
    level: 'silly',
    writeFn: () => {},
  };
  return {
    scoped,
    log: {
      scope: vi.fn(() => scoped),
      transports: { file: fileTransport, console: consoleTransport },
    },
  };
});

vi.mock('electron-log/node', () => ({ default: electronLog.log }));

import { configureLogging, createLogCallback, defaultLogPath } from '@native-host/logger';

describe('configureLogging', () => {
  it('logs info to the file and warnings to the console by default', () => {
    configureLogging(DEFAULT_SETTINGS, '/tmp/keyreel-test.log');

    expect(electronLog.log.transports.file.level).toBe('info');
    expect(electronLog.log.transports.console.level).toBe('warn');
    expect(electronLog.log.transports.file.resolvePathFn()).toBe('/tmp/keyreel-test.log');
  });

  it('logs everything in debug mode', () => {
    configureLogging({ ...DEFAULT_SETTINGS, debug: true }, '/tmp/keyreel-test.log');

    expect(electronLog.log.transports.file.level).toBe('debug');
    expect(electronLog.log.transports.console.level).toBe('debug');
  });

  it('writes console output to stderr', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    configureLogging(DEFAULT_SETTINGS, '/tmp/keyreel-test.log');

    electronLog.log.transports.console.writeFn({ message: { data: ['store', 'offline', 3] } });

    expect(stderr).toHaveBeenCalledWith('store offline 3\n');
  });
});

describe('createLogCallback', () => {
  it('forwards each level to a scoped logger', () => {
    const onLog = createLogCallback('replay');
    onLog('warn', 'direct tier failed');
    onLog('debug', 'Executing: C (DOWN)');

    expect(electronLog.log.scope).toHaveBeenCalledWith('replay');
    expect(electronLog.scoped.warn).toHaveBeenCalledWith('direct tier failed');
    expect(electronLog.scoped.debug).toHaveBeenCalledWith('Executing: C (DOWN)');
  });
});

describe('defaultLogPath', () => {
  it('lives under the keyreel directory', () => {
    expect(defaultLogPath('/home/test')).toBe('/home/test/.keyreel/logs/host.log');
  });
});
