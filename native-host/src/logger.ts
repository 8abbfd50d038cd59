/**
 * Logging for the native host through electron-log
 *
 * stdout carries the framed message channel, so console output is written
 * to stderr. The file transport logs to ~/.keyreel/logs/host.log.
 */
import log from 'electron-log/node';
import * as os from 'os';
import * as path from 'path';
import { LogCallback, Settings } from '../../shared/src/index';

export function defaultLogPath(home: string = os.homedir()): string {
  return path.join(home, '.keyreel', 'logs', 'host.log');
}

/**
 * Configure transports for the given settings
 */
export function configureLogging(settings: Settings, logPath: string = defaultLogPath()): void {
  log.transports.file.level = settings.debug ? 'debug' : 'info';
  log.transports.file.resolvePathFn = () => logPath;
  log.transports.console.level = settings.debug ? 'debug' : 'warn';
  log.transports.console.writeFn = ({ message }) => {
    process.stderr.write(`${message.data.map(String).join(' ')}\n`);
  };
}

/**
 * Log callback bound to a scoped electron-log logger
 */
export function createLogCallback(scope: string): LogCallback {
  const scoped = log.scope(scope);
  return (level, message) => {
    scoped[level](message);
  };
}
