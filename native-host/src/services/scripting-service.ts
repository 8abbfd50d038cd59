/**
 * AppleScript runner for the scripted keystroke tier
 *
 * Each script is passed to osascript as a single -e argument, so no shell
 * quoting is involved.
 */
import { AutomationError, ScriptRunner, errorMessage } from '../../../shared/src/index';
import { RunFileFn, runFile } from './process-runner';

export interface OsaScriptRunnerOptions {
  /** Per-script timeout in ms (default: 5000) */
  timeoutMs?: number;
  runFile?: RunFileFn;
}

export class OsaScriptRunner implements ScriptRunner {
  private timeoutMs: number;
  private exec: RunFileFn;

  constructor(options: OsaScriptRunnerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.exec = options.runFile ?? runFile;
  }

  async run(script: string): Promise<void> {
    try {
      await this.exec('osascript', ['-e', script], this.timeoutMs);
    } catch (error) {
      throw new AutomationError(errorMessage(error));
    }
  }
}

/**
 * Runner used where AppleScript is unavailable; every script fails
 */
export class UnavailableScriptRunner implements ScriptRunner {
  private platform: string;

  constructor(platform: string) {
    this.platform = platform;
  }

  async run(): Promise<void> {
    throw new AutomationError(`Scripted keystrokes are not available on ${this.platform}`);
  }
}

/**
 * Pick the runner for the current platform
 */
export function createScriptRunner(platform: string = process.platform, options: OsaScriptRunnerOptions = {}): ScriptRunner {
  return platform === 'darwin' ? new OsaScriptRunner(options) : new UnavailableScriptRunner(platform);
}
