/**
 * keyreel Settings
 *
 * Settings shared by the core engine and the native host.
 */

// ============================================================================
// Replay tiers
// ============================================================================

/**
 * Replay tiers, from most to least faithful
 */
export type ReplayTier = 'direct' | 'scripted' | 'best-effort';

/**
 * Fixed order in which tiers are attempted
 */
export const TIER_ORDER: readonly ReplayTier[] = ['direct', 'scripted', 'best-effort'];

/**
 * Check whether a string names a replay tier
 */
export function isReplayTier(value: unknown): value is ReplayTier {
  return value === 'direct' || value === 'scripted' || value === 'best-effort';
}

// ============================================================================
// Settings Interface
// ============================================================================

/**
 * All configurable settings
 */
export interface Settings {
  // Logging
  debug: boolean;

  // Replay timing (ms)
  interEventDelayMs: number;
  bestEffortKeyDelayMs: number;
  bestEffortReleaseDelayMs: number;

  // Background tasks (ms)
  authorizationCheckIntervalMs: number;
  cacheRefreshIntervalMs: number;

  // Caller-side timeouts (ms)
  recordingAutoStopMs: number;
  bindingTimeoutMs: number;

  // Key that clears a binding while awaiting one (virtual key code)
  clearBindingKeyCode: number;

  // Tiers the engine may use, always run in TIER_ORDER
  enabledTiers: ReplayTier[];

  // Macro store file ('' = native host default)
  storePath: string;
}

/**
 * Default settings values
 */
export const DEFAULT_SETTINGS: Settings = {
  debug: false,

  interEventDelayMs: 20,
  bestEffortKeyDelayMs: 100,
  bestEffortReleaseDelayMs: 50,

  authorizationCheckIntervalMs: 3000,
  cacheRefreshIntervalMs: 5000,

  recordingAutoStopMs: 3000,
  bindingTimeoutMs: 3000,

  // Delete
  clearBindingKeyCode: 51,

  enabledTiers: ['direct', 'scripted', 'best-effort'],

  storePath: '',
};

const DELAY_RANGE = { min: 0, max: 5000 };
const INTERVAL_RANGE = { min: 250, max: 60000 };

function clamp(value: number, range: { min: number; max: number }, fallback: number): number {
  if (isNaN(value) || !isFinite(value)) {
    return fallback;
  }
  return Math.max(range.min, Math.min(range.max, Math.round(value)));
}

/**
 * Merge partial settings with defaults
 */
export function mergeWithDefaults(partial: Partial<Settings>): Settings {
  return { ...DEFAULT_SETTINGS, ...partial };
}

/**
 * Clamp timing values into their allowed ranges and drop invalid fields
 */
export function validateSettings(settings: Settings): Settings {
  const d = DEFAULT_SETTINGS;
  const enabledTiers = TIER_ORDER.filter(tier => settings.enabledTiers.includes(tier));

  return {
    debug: Boolean(settings.debug),
    interEventDelayMs: clamp(settings.interEventDelayMs, DELAY_RANGE, d.interEventDelayMs),
    bestEffortKeyDelayMs: clamp(settings.bestEffortKeyDelayMs, DELAY_RANGE, d.bestEffortKeyDelayMs),
    bestEffortReleaseDelayMs: clamp(settings.bestEffortReleaseDelayMs, DELAY_RANGE, d.bestEffortReleaseDelayMs),
    authorizationCheckIntervalMs: clamp(settings.authorizationCheckIntervalMs, INTERVAL_RANGE, d.authorizationCheckIntervalMs),
    cacheRefreshIntervalMs: clamp(settings.cacheRefreshIntervalMs, INTERVAL_RANGE, d.cacheRefreshIntervalMs),
    recordingAutoStopMs: clamp(settings.recordingAutoStopMs, INTERVAL_RANGE, d.recordingAutoStopMs),
    bindingTimeoutMs: clamp(settings.bindingTimeoutMs, INTERVAL_RANGE, d.bindingTimeoutMs),
    clearBindingKeyCode: Number.isInteger(settings.clearBindingKeyCode) && settings.clearBindingKeyCode >= 0
      ? settings.clearBindingKeyCode
      : d.clearBindingKeyCode,
    enabledTiers: enabledTiers.length > 0 ? enabledTiers : [...d.enabledTiers],
    storePath: typeof settings.storePath === 'string' ? settings.storePath : d.storePath,
  };
}

/**
 * Build settings from an untyped source such as a parsed JSON file.
 * Fields of the wrong type are ignored.
 */
export function settingsFromUnknown(value: unknown): Settings {
  if (typeof value !== 'object' || value === null) {
    return { ...DEFAULT_SETTINGS };
  }
  const partial: Partial<Settings> = {};
  const source = new Map<string, unknown>(Object.entries(value));

  const numberKeys = [
    'interEventDelayMs',
    'bestEffortKeyDelayMs',
    'bestEffortReleaseDelayMs',
    'authorizationCheckIntervalMs',
    'cacheRefreshIntervalMs',
    'recordingAutoStopMs',
    'bindingTimeoutMs',
    'clearBindingKeyCode',
  ] as const;
  for (const key of numberKeys) {
    const raw = source.get(key);
    if (typeof raw === 'number') {
      partial[key] = raw;
    }
  }

  const debug = source.get('debug');
  if (typeof debug === 'boolean') partial.debug = debug;

  const storePath = source.get('storePath');
  if (typeof storePath === 'string') partial.storePath = storePath;

  const tiers = source.get('enabledTiers');
  if (Array.isArray(tiers)) partial.enabledTiers = tiers.filter(isReplayTier);

  return validateSettings(mergeWithDefaults(partial));
}
