/**
 * Settings loading for the native host
 *
 * Reads $KEYREEL_CONFIG, or ~/.keyreel/settings.json when unset. A missing
 * file gives the defaults; a malformed one gives the defaults and a warning.
 * KEYREEL_DEBUG=1 turns on debug logging regardless of the file.
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_SETTINGS,
  LogCallback,
  Settings,
  errorMessage,
  settingsFromUnknown,
  silentLog,
} from '../../shared/src/index';
import { defaultStorePath } from './services/macro-store';

export interface LoadSettingsOptions {
  env?: NodeJS.ProcessEnv;
  home?: string;
  onLog?: LogCallback;
}

/**
 * Path of the settings file
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env, home: string = os.homedir()): string {
  const configured = env.KEYREEL_CONFIG;
  if (configured && configured.trim().length > 0) {
    return configured;
  }
  return path.join(home, '.keyreel', 'settings.json');
}

/**
 * Path of the macro document for these settings
 */
export function resolveStorePath(settings: Settings, home: string = os.homedir()): string {
  return settings.storePath.length > 0 ? settings.storePath : defaultStorePath(home);
}

export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
  const env = options.env ?? process.env;
  const log = options.onLog ?? silentLog;
  const configPath = resolveConfigPath(env, options.home);

  let settings: Settings = { ...DEFAULT_SETTINGS };
  let text: string | null = null;
  try {
    text = await fs.promises.readFile(configPath, 'utf8');
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      log('warn', `Cannot read settings ${configPath}: ${errorMessage(error)}`);
    }
  }

  if (text !== null) {
    try {
      settings = settingsFromUnknown(JSON.parse(text));
    } catch (error) {
      log('warn', `Malformed settings ${configPath}, using defaults: ${errorMessage(error)}`);
    }
  }

  if (env.KEYREEL_DEBUG === '1') {
    settings = { ...settings, debug: true };
  }
  return settings;
}
