/**
 * Key Tables
 *
 * Lookup data for keyboard codes (macOS virtual key code space) and mouse
 * buttons: display names, best-effort characters, nut.js key names and
 * uiohook scan codes. The table itself lives in data/keycodes.json.
 */

import keycodeData from './data/keycodes.json';

/**
 * One row of the key table
 */
export interface KeyTableEntry {
  /** Virtual key code */
  code: number;
  /** Display name (lowercase for single characters) */
  name: string;
  /** Character this key types without modifiers, if any */
  char?: string;
  /** nut.js Key enum member name */
  nut?: string;
  /** uiohook keycode that captures as this key */
  uiohook?: number;
}

/**
 * Modifier mask bits
 */
export const MODIFIER_BITS = {
  SHIFT: 1,
  CONTROL: 2,
  OPTION: 4,
  COMMAND: 8,
} as const;

export const MODIFIER_MASK_ALL = 0xf;

/**
 * Key codes of the modifier keys themselves
 */
export const MODIFIER_KEY_CODES = {
  RIGHT_COMMAND: 54,
  LEFT_COMMAND: 55,
  LEFT_SHIFT: 56,
  CAPS_LOCK: 57,
  LEFT_OPTION: 58,
  LEFT_CONTROL: 59,
  RIGHT_SHIFT: 60,
  RIGHT_OPTION: 61,
  RIGHT_CONTROL: 62,
  FUNCTION: 63,
} as const;

/** Mouse button number of the primary (left) button */
export const MOUSE_PRIMARY = 0;

const MODIFIER_SYMBOLS: Record<number, string> = {
  54: '⌘',
  55: '⌘',
  56: '⇧',
  60: '⇧',
  58: '⌥',
  61: '⌥',
  59: '⌃',
  62: '⌃',
  57: 'Caps Lock',
  63: 'Function',
};

const MOUSE_BUTTON_NAMES: Record<number, string> = {
  0: 'Left Click',
  1: 'Right Click',
  2: 'Middle Click',
  3: 'Mouse Button 4',
  4: 'Mouse Button 5',
};

function isKeyTableEntry(value: unknown): value is KeyTableEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('code' in value) || typeof value.code !== 'number') return false;
  if (!('name' in value) || typeof value.name !== 'string') return false;
  if ('char' in value && typeof value.char !== 'string') return false;
  if ('nut' in value && typeof value.nut !== 'string') return false;
  if ('uiohook' in value && typeof value.uiohook !== 'number') return false;
  return true;
}

function loadKeyTable(data: unknown): KeyTableEntry[] {
  if (typeof data !== 'object' || data === null || !('keys' in data) || !Array.isArray(data.keys)) {
    throw new Error('Key table is missing its "keys" array');
  }
  const keys: unknown[] = data.keys;
  return keys.filter(isKeyTableEntry);
}

const KEY_TABLE: KeyTableEntry[] = loadKeyTable(keycodeData);
const BY_CODE = new Map<number, KeyTableEntry>(KEY_TABLE.map(entry => [entry.code, entry]));
const BY_UIOHOOK = new Map<number, KeyTableEntry>();
for (const entry of KEY_TABLE) {
  if (entry.uiohook !== undefined) {
    BY_UIOHOOK.set(entry.uiohook, entry);
  }
}

/**
 * Get the table row for a key code
 */
export function getKeyEntry(code: number): KeyTableEntry | undefined {
  return BY_CODE.get(code);
}

/**
 * All rows of the key table
 */
export function getKeyTable(): readonly KeyTableEntry[] {
  return KEY_TABLE;
}

/**
 * Translate a uiohook keycode into the virtual key code space
 */
export function keyCodeFromUiohook(uiohookCode: number): number | undefined {
  return BY_UIOHOOK.get(uiohookCode)?.code;
}

/**
 * Check whether a keyboard code is a modifier key itself
 */
export function isModifierKeyCode(code: number): boolean {
  return code in MODIFIER_SYMBOLS;
}

/**
 * Symbol of a modifier key (e.g. ⌘ for either command key)
 */
export function modifierKeySymbol(code: number): string {
  return MODIFIER_SYMBOLS[code] ?? `Key ${code}`;
}

/**
 * Display name of a keyboard key, "Key <code>" when unknown
 */
export function keyDescription(code: number): string {
  return BY_CODE.get(code)?.name ?? `Key ${code}`;
}

/**
 * Display name of a mouse button
 */
export function mouseButtonDescription(button: number): string {
  return MOUSE_BUTTON_NAMES[button] ?? `Mouse Button ${button}`;
}
