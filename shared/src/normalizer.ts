/**
 * Event Normalizer
 *
 * Converts raw platform input callbacks into InputEvent values. normalize()
 * touches no shared state and may be called from any capture callback.
 */

import { InputChannel, InputEvent, createInputEvent } from './input-event';
import { MODIFIER_BITS, MODIFIER_KEY_CODES } from './key-labels';

/**
 * Raw event tuple delivered by a capture source
 */
export interface RawInputEvent {
  channel: InputChannel;
  code: number;
  modifierMask: number;
  /** true = down */
  phase: boolean;
  /** Platform timestamp in ms, defaults to now */
  timestamp?: number;
}

/**
 * Modifier flags word as reported by platforms that signal modifier
 * changes separately from key events
 */
export interface ModifierFlags {
  shift: boolean;
  control: boolean;
  option: boolean;
  command: boolean;
  function?: boolean;
  capsLock?: boolean;
}

/**
 * Normalize one raw platform event
 */
export function normalize(raw: RawInputEvent): InputEvent {
  return createInputEvent({
    channel: raw.channel,
    code: raw.code,
    modifierMask: raw.modifierMask,
    phase: raw.phase,
    capturedAt: raw.timestamp,
  });
}

/**
 * Build a modifier mask from individual flags
 */
export function modifierMaskFromFlags(flags: Pick<ModifierFlags, 'shift' | 'control' | 'option' | 'command'>): number {
  let mask = 0;
  if (flags.shift) mask |= MODIFIER_BITS.SHIFT;
  if (flags.control) mask |= MODIFIER_BITS.CONTROL;
  if (flags.option) mask |= MODIFIER_BITS.OPTION;
  if (flags.command) mask |= MODIFIER_BITS.COMMAND;
  return mask;
}

/**
 * Order in which changed modifiers are reported
 */
const FLAG_KEYS: Array<{ flag: keyof ModifierFlags; code: number }> = [
  { flag: 'shift', code: MODIFIER_KEY_CODES.LEFT_SHIFT },
  { flag: 'control', code: MODIFIER_KEY_CODES.LEFT_CONTROL },
  { flag: 'option', code: MODIFIER_KEY_CODES.LEFT_OPTION },
  { flag: 'command', code: MODIFIER_KEY_CODES.LEFT_COMMAND },
  { flag: 'function', code: MODIFIER_KEY_CODES.FUNCTION },
  { flag: 'capsLock', code: MODIFIER_KEY_CODES.CAPS_LOCK },
];

/**
 * Turns successive modifier flag words into per-key transitions.
 *
 * Stateful: owned by the controller and only touched from its event queue.
 */
export class ModifierFlagsTracker {
  private previous: ModifierFlags = {
    shift: false,
    control: false,
    option: false,
    command: false,
    function: false,
    capsLock: false,
  };

  /**
   * Record a new flags word and return one raw keyboard event per changed
   * modifier. Modifier transitions carry an empty mask.
   */
  update(flags: ModifierFlags, timestamp?: number): RawInputEvent[] {
    const changed: RawInputEvent[] = [];
    for (const { flag, code } of FLAG_KEYS) {
      const now = flags[flag] ?? false;
      const before = this.previous[flag] ?? false;
      if (now !== before) {
        changed.push({ channel: 'keyboard', code, modifierMask: 0, phase: now, timestamp });
      }
    }
    this.previous = { ...flags, function: flags.function ?? false, capsLock: flags.capsLock ?? false };
    return changed;
  }

  /**
   * Forget the last known flags
   */
  reset(): void {
    this.previous = {
      shift: false,
      control: false,
      option: false,
      command: false,
      function: false,
      capsLock: false,
    };
  }
}
