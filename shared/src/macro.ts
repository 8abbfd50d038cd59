/**
 * Macro Model
 *
 * A named, storable sequence of input events plus an optional trigger
 * binding. The `steps` list is a legacy display-only representation; replay
 * never reads it.
 */

import { randomUUID } from 'crypto';
import { MacroDataError } from './errors';
import {
  InputEvent,
  InputEventRecord,
  decodeInputEvent,
  encodeInputEvent,
} from './input-event';

export const DEFAULT_MACRO_NAME = 'New Macro';

/**
 * Legacy step kinds
 */
export type MacroStepType = 'key' | 'mouse' | 'text' | 'delay';

/**
 * Legacy typed step
 */
export interface MacroStep {
  id: string;
  type: MacroStepType;
  /** Key code (key) or button (mouse) */
  keyCode?: number;
  modifiers: number;
  /** Literal text (text) */
  text?: string;
  /** Pause in seconds (delay) */
  delay?: number;
}

/**
 * A stored automation unit
 */
export interface Macro {
  readonly id: string;
  name: string;
  /** Replay order: both down and up phases, as they occurred */
  keySequence: InputEvent[];
  binding: InputEvent | null;
  readonly createdAt: number;
  steps: MacroStep[];
}

/**
 * Persisted form of a Macro
 */
export interface MacroRecord {
  id: string;
  name: string;
  keySequence: InputEventRecord[];
  binding: InputEventRecord | null;
  /** ISO timestamp */
  createdAt: string;
  steps: MacroStep[];
}

/**
 * Options for creating a macro
 */
export interface CreateMacroOptions {
  name?: string;
  keySequence?: InputEvent[];
  binding?: InputEvent | null;
  steps?: MacroStep[];
  createdAt?: number;
}

/**
 * Name to persist for a requested name; absent or blank names get the default
 */
export function resolveMacroName(name?: string): string {
  return name === undefined || name.trim().length === 0 ? DEFAULT_MACRO_NAME : name;
}

/**
 * Create a new macro (empty by default)
 */
export function createMacro(options: CreateMacroOptions = {}): Macro {
  return {
    id: randomUUID(),
    name: resolveMacroName(options.name),
    keySequence: options.keySequence ? [...options.keySequence] : [],
    binding: options.binding ?? null,
    createdAt: options.createdAt ?? Date.now(),
    steps: options.steps ? [...options.steps] : [],
  };
}

/**
 * Apply a name edit. Empty (or whitespace-only) names are discarded.
 */
export function renameMacro(macro: Macro, name: string): { macro: Macro; changed: boolean } {
  if (name.trim().length === 0) {
    return { macro, changed: false };
  }
  return { macro: { ...macro, name }, changed: name !== macro.name };
}

/**
 * Sort macros newest first (default list order)
 */
export function sortMacrosNewestFirst(macros: readonly Macro[]): Macro[] {
  return [...macros].sort((a, b) => b.createdAt - a.createdAt);
}

// ===== Legacy steps =====

/**
 * Derive key/mouse steps from the down events of a sequence
 */
export function projectSteps(keySequence: readonly InputEvent[]): MacroStep[] {
  return keySequence
    .filter(event => event.phase)
    .map((event): MacroStep => ({
      id: randomUUID(),
      type: event.channel === 'mouse' ? 'mouse' : 'key',
      keyCode: event.code,
      modifiers: event.modifierMask,
    }));
}

function isMacroStep(value: unknown): value is MacroStep {
  if (typeof value !== 'object' || value === null) return false;
  if (!('id' in value) || typeof value.id !== 'string') return false;
  if (!('type' in value)) return false;
  if (value.type !== 'key' && value.type !== 'mouse' && value.type !== 'text' && value.type !== 'delay') return false;
  if (!('modifiers' in value) || typeof value.modifiers !== 'number') return false;
  if ('keyCode' in value && value.keyCode !== undefined && typeof value.keyCode !== 'number') return false;
  if ('text' in value && value.text !== undefined && typeof value.text !== 'string') return false;
  if ('delay' in value && value.delay !== undefined && typeof value.delay !== 'number') return false;
  return true;
}

// ===== Serialization =====

/**
 * Encode a macro for storage
 */
export function encodeMacro(macro: Macro): MacroRecord {
  return {
    id: macro.id,
    name: macro.name,
    keySequence: macro.keySequence.map(encodeInputEvent),
    binding: macro.binding ? encodeInputEvent(macro.binding) : null,
    createdAt: new Date(macro.createdAt).toISOString(),
    steps: macro.steps.map(step => ({ ...step })),
  };
}

/**
 * Decode a stored macro
 */
export function decodeMacro(value: unknown): Macro {
  if (typeof value !== 'object' || value === null) {
    throw new MacroDataError('Macro record must be an object');
  }
  if (!('id' in value) || typeof value.id !== 'string' || value.id.length === 0) {
    throw new MacroDataError('Macro record is missing its id');
  }
  if (!('name' in value) || typeof value.name !== 'string') {
    throw new MacroDataError(`Macro ${value.id} is missing its name`);
  }
  if (!('keySequence' in value) || !Array.isArray(value.keySequence)) {
    throw new MacroDataError(`Macro ${value.id} is missing its key sequence`);
  }
  if (!('createdAt' in value) || typeof value.createdAt !== 'string') {
    throw new MacroDataError(`Macro ${value.id} is missing its creation time`);
  }
  const createdAt = Date.parse(value.createdAt);
  if (Number.isNaN(createdAt)) {
    throw new MacroDataError(`Macro ${value.id} has an invalid creation time: ${value.createdAt}`);
  }
  const sequence: unknown[] = value.keySequence;
  const rawBinding = 'binding' in value ? value.binding : null;
  const rawSteps: unknown = 'steps' in value ? value.steps : [];

  return {
    id: value.id,
    name: value.name,
    keySequence: sequence.map(decodeInputEvent),
    binding: rawBinding === null || rawBinding === undefined ? null : decodeInputEvent(rawBinding),
    createdAt,
    steps: Array.isArray(rawSteps) ? rawSteps.filter(isMacroStep) : [],
  };
}
