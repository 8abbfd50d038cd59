/**
 * InputEvent Model
 *
 * One captured or replayed hardware input occurrence. Instances are frozen
 * on construction. The identity token and capture time are local to this
 * process: they are never written to storage and are regenerated on decode.
 */

import { MacroDataError } from './errors';
import {
  MODIFIER_MASK_ALL,
  MOUSE_PRIMARY,
  isModifierKeyCode,
  keyDescription,
  modifierKeySymbol,
  mouseButtonDescription,
} from './key-labels';

/**
 * Input channel
 */
export type InputChannel = 'keyboard' | 'mouse';

/**
 * One captured input event
 */
export interface InputEvent {
  readonly channel: InputChannel;
  /** Key code (keyboard) or button number (mouse) */
  readonly code: number;
  /** bit0 shift, bit1 control, bit2 option, bit3 command */
  readonly modifierMask: number;
  /** true = down/press, false = up/release */
  readonly phase: boolean;
  /** Human-readable description, derived from channel, code and phase */
  readonly label: string;
  /** Locally unique token for telling identical events apart in lists */
  readonly sequenceKey: string;
  /** Capture wall-clock time in ms, for live display only */
  readonly capturedAt: number;
}

/**
 * Persisted form of an InputEvent
 */
export interface InputEventRecord {
  channel: InputChannel;
  code: number;
  modifierMask: number;
  phase: boolean;
  label: string;
}

/**
 * Fields needed to construct an InputEvent
 */
export interface InputEventInit {
  channel: InputChannel;
  code: number;
  modifierMask?: number;
  phase?: boolean;
  capturedAt?: number;
}

let sequenceCounter = 0;

/**
 * Create a new locally unique sequence key
 */
export function createSequenceKey(): string {
  sequenceCounter += 1;
  return `${Date.now().toString(36)}-${sequenceCounter.toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Derive the display label of an event.
 *
 * Modifier state is never part of the label; consumers render it separately.
 * The phase is accepted so the label stays a function of the full
 * (channel, code, phase) triple, even though current labels do not vary by it.
 */
export function deriveLabel(channel: InputChannel, code: number, _phase: boolean): string {
  if (channel === 'mouse') {
    return mouseButtonDescription(code);
  }
  if (isModifierKeyCode(code)) {
    return modifierKeySymbol(code);
  }
  const name = keyDescription(code);
  return name.length === 1 ? name.toUpperCase() : name;
}

function buildEvent(
  channel: InputChannel,
  code: number,
  modifierMask: number,
  phase: boolean,
  label: string,
  capturedAt: number
): InputEvent {
  return Object.freeze({
    channel,
    code,
    modifierMask: modifierMask & MODIFIER_MASK_ALL,
    phase,
    label,
    sequenceKey: createSequenceKey(),
    capturedAt,
  });
}

/**
 * Create an InputEvent, deriving its label
 */
export function createInputEvent(init: InputEventInit): InputEvent {
  const phase = init.phase ?? true;
  return buildEvent(
    init.channel,
    init.code,
    init.modifierMask ?? 0,
    phase,
    deriveLabel(init.channel, init.code, phase),
    init.capturedAt ?? Date.now()
  );
}

/**
 * Shorthand for a keyboard event
 */
export function keyEvent(code: number, phase: boolean, modifierMask = 0): InputEvent {
  return createInputEvent({ channel: 'keyboard', code, phase, modifierMask });
}

/**
 * Shorthand for a mouse event
 */
export function mouseEvent(button: number, phase: boolean, modifierMask = 0): InputEvent {
  return createInputEvent({ channel: 'mouse', code: button, phase, modifierMask });
}

/**
 * Whether an event is a down press of the primary mouse button
 */
export function isPrimaryMouseDown(event: InputEvent): boolean {
  return event.channel === 'mouse' && event.code === MOUSE_PRIMARY && event.phase;
}

/**
 * Compare two events by their durable fields (identity is ignored)
 */
export function isSameInput(a: InputEvent, b: InputEvent): boolean {
  return (
    a.channel === b.channel &&
    a.code === b.code &&
    a.modifierMask === b.modifierMask &&
    a.phase === b.phase
  );
}

/**
 * Encode an event for storage
 */
export function encodeInputEvent(event: InputEvent): InputEventRecord {
  return {
    channel: event.channel,
    code: event.code,
    modifierMask: event.modifierMask,
    phase: event.phase,
    label: event.label,
  };
}

/**
 * Check that a value has the shape of an InputEventRecord
 */
export function isInputEventRecord(value: unknown): value is InputEventRecord {
  if (typeof value !== 'object' || value === null) return false;
  if (!('channel' in value) || (value.channel !== 'keyboard' && value.channel !== 'mouse')) return false;
  if (!('code' in value) || typeof value.code !== 'number' || !Number.isInteger(value.code)) return false;
  if (!('modifierMask' in value) || typeof value.modifierMask !== 'number') return false;
  if (!('phase' in value) || typeof value.phase !== 'boolean') return false;
  if (!('label' in value) || typeof value.label !== 'string') return false;
  return true;
}

/**
 * Decode a stored event. The identity token and capture time are always fresh.
 */
export function decodeInputEvent(value: unknown): InputEvent {
  if (!isInputEventRecord(value)) {
    throw new MacroDataError(`Invalid input event record: ${JSON.stringify(value)}`);
  }
  return buildEvent(value.channel, value.code, value.modifierMask, value.phase, value.label, Date.now());
}
