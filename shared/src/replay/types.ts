/**
 * Replay strategy contracts and the platform sinks they deliver through
 */

import { ReplayErrorCode } from '../errors';
import { InputChannel, InputEvent } from '../input-event';
import { MODIFIER_BITS } from '../key-labels';
import { ReplayTier } from '../settings';

/**
 * Platform modifier key names
 */
export type PlatformModifier = 'shift' | 'control' | 'option' | 'command';

/**
 * Translate a modifier mask into platform modifiers, in mask-bit order
 */
export function toPlatformModifiers(mask: number): PlatformModifier[] {
  const modifiers: PlatformModifier[] = [];
  if (mask & MODIFIER_BITS.SHIFT) modifiers.push('shift');
  if (mask & MODIFIER_BITS.CONTROL) modifiers.push('control');
  if (mask & MODIFIER_BITS.OPTION) modifiers.push('option');
  if (mask & MODIFIER_BITS.COMMAND) modifiers.push('command');
  return modifiers;
}

/**
 * One discrete hardware-level synthetic event (tier 1)
 */
export interface SyntheticEvent {
  channel: InputChannel;
  code: number;
  /** true = down */
  down: boolean;
  modifiers: PlatformModifier[];
}

/**
 * Highest-privilege synthetic input path. post() rejects with a
 * SynthesisError (or UnsupportedInputError) when the event cannot be built.
 */
export interface SyntheticInputSink {
  post(event: SyntheticEvent): Promise<void>;
  /** Release every key the sink still holds down */
  releaseAll?(): Promise<void>;
}

/**
 * Scripting/automation facility (tier 2). run() rejects when the script fails.
 */
export interface ScriptRunner {
  run(script: string): Promise<void>;
}

/**
 * Character-level keystroke for the most permissive path (tier 3)
 */
export interface BestEffortStroke {
  code: number;
  char: string;
  down: boolean;
  modifiers: PlatformModifier[];
}

/**
 * Most permissive, least precise input path (tier 3)
 */
export interface BestEffortSink {
  dispatch(stroke: BestEffortStroke): Promise<void>;
}

/**
 * A single event or action that failed inside a tier
 */
export interface TierFailure {
  /** Index into the replayed sequence */
  index: number;
  code: ReplayErrorCode;
  message: string;
}

/**
 * Result of one tier attempt
 */
export interface TierResult {
  success: boolean;
  /** Synthetic events, scripts or strokes delivered */
  delivered: number;
  failures: TierFailure[];
}

/**
 * One interchangeable replay strategy
 */
export interface ReplayStrategy {
  readonly tier: ReplayTier;
  attempt(sequence: readonly InputEvent[]): Promise<TierResult>;
}

/**
 * Delay function used between deliveries
 */
export type DelayFn = (ms: number) => Promise<void>;

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
