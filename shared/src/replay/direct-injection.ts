/**
 * Tier 1: direct synthetic injection
 *
 * Replays every event in recorded order, both phases, one synthetic
 * hardware-level event each, separated by a fixed delay. All-or-nothing:
 * the first event that cannot be synthesized aborts the whole tier. Keys
 * the sink still holds when the tier ends are released.
 */

import { REPLAY_ERROR_CODES, UnsupportedInputError, errorCodeOf, errorMessage } from '../errors';
import { InputEvent } from '../input-event';
import { LogCallback, silentLog } from '../logging';
import {
  DelayFn,
  ReplayStrategy,
  SyntheticEvent,
  SyntheticInputSink,
  TierResult,
  sleep,
  toPlatformModifiers,
} from './types';

/** Mouse buttons that can be synthesized: primary, secondary, middle */
const SUPPORTED_MOUSE_BUTTONS = new Set([0, 1, 2]);

export interface DirectInjectionOptions {
  /** Delay after each event in ms (default: 20) */
  interEventDelayMs?: number;
  delay?: DelayFn;
  onLog?: LogCallback;
}

/**
 * Translate a recorded event into the sink's representation
 */
export function toSyntheticEvent(event: InputEvent): SyntheticEvent {
  if (event.channel === 'mouse' && !SUPPORTED_MOUSE_BUTTONS.has(event.code)) {
    throw new UnsupportedInputError(`Unsupported mouse button: ${event.code}`);
  }
  return {
    channel: event.channel,
    code: event.code,
    down: event.phase,
    modifiers: toPlatformModifiers(event.modifierMask),
  };
}

export class DirectInjectionStrategy implements ReplayStrategy {
  readonly tier = 'direct' as const;
  private sink: SyntheticInputSink;
  private interEventDelayMs: number;
  private delay: DelayFn;
  private log: LogCallback;

  constructor(sink: SyntheticInputSink, options: DirectInjectionOptions = {}) {
    this.sink = sink;
    this.interEventDelayMs = options.interEventDelayMs ?? 20;
    this.delay = options.delay ?? sleep;
    this.log = options.onLog ?? silentLog;
  }

  async attempt(sequence: readonly InputEvent[]): Promise<TierResult> {
    try {
      return await this.deliver(sequence);
    } finally {
      await this.releaseHeld();
    }
  }

  private async deliver(sequence: readonly InputEvent[]): Promise<TierResult> {
    let delivered = 0;

    for (let index = 0; index < sequence.length; index++) {
      const event = sequence[index];
      this.log('debug', `Executing: ${event.label} (${event.phase ? 'DOWN' : 'UP'})`);
      try {
        await this.sink.post(toSyntheticEvent(event));
      } catch (error) {
        const message = errorMessage(error);
        this.log('error', `Failed to execute ${event.label}: ${message}`);
        return {
          success: false,
          delivered,
          failures: [{
            index,
            code: errorCodeOf(error, REPLAY_ERROR_CODES.SYNTHESIS_FAILED),
            message,
          }],
        };
      }
      delivered++;
      await this.delay(this.interEventDelayMs);
    }

    return { success: true, delivered, failures: [] };
  }

  private async releaseHeld(): Promise<void> {
    if (!this.sink.releaseAll) {
      return;
    }
    try {
      await this.sink.releaseAll();
    } catch (error) {
      this.log('error', `Failed to release held keys: ${errorMessage(error)}`);
    }
  }
}
