/**
 * Log callback used by the core. The native host binds it to electron-log;
 * tests pass a collector.
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Callback for log messages
 */
export type LogCallback = (level: LogLevel, message: string) => void;

/**
 * Log callback that drops everything
 */
export const silentLog: LogCallback = () => {};

/**
 * Wrap a callback so debug lines are only forwarded when debugging is on
 */
export function filterDebug(onLog: LogCallback, isDebugging: () => boolean): LogCallback {
  return (level, message) => {
    if (level === 'debug' && !isDebugging()) {
      return;
    }
    onLog(level, message);
  };
}
