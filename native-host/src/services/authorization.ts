/**
 * Input-control authorization
 *
 * On macOS, replaying and capturing input needs the Accessibility grant.
 * The grant is probed through System Events UI scripting; the request
 * opens the Accessibility pane of System Settings. Other platforms need
 * no grant.
 */
import { AuthorizationProvider } from '../../../shared/src/index';
import { RunFileFn, runFile } from './process-runner';

const PROBE_SCRIPT = 'tell application "System Events" to get UI elements enabled';
const ACCESSIBILITY_PANE = 'x-apple.systempreferences:com.apple.preference.security?Privacy_Accessibility';

export class MacAuthorizationProvider implements AuthorizationProvider {
  private run: RunFileFn;

  constructor(run: RunFileFn = runFile) {
    this.run = run;
  }

  /**
   * A failing probe means not authorized
   */
  async isAuthorized(): Promise<boolean> {
    try {
      const { stdout } = await this.run('osascript', ['-e', PROBE_SCRIPT], 5000);
      return stdout.trim() === 'true';
    } catch {
      return false;
    }
  }

  async requestAuthorization(): Promise<void> {
    await this.run('open', [ACCESSIBILITY_PANE]);
  }
}

export class AlwaysAuthorizedProvider implements AuthorizationProvider {
  async isAuthorized(): Promise<boolean> {
    return true;
  }

  async requestAuthorization(): Promise<void> {
    // Nothing to grant
  }
}

export function createAuthorizationProvider(
  platform: string = process.platform,
  run: RunFileFn = runFile
): AuthorizationProvider {
  return platform === 'darwin' ? new MacAuthorizationProvider(run) : new AlwaysAuthorizedProvider();
}
