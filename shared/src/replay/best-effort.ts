/**
 * Tier 3: best-effort fallback
 *
 * Lossy by nature: only down events are replayed, each mapped to a
 * character and dispatched as a down followed shortly by an up. Held keys
 * and chords are not reproduced.
 */

import {
  REPLAY_ERROR_CODES,
  UnsupportedInputError,
  errorCodeOf,
  errorMessage,
} from '../errors';
import { InputEvent } from '../input-event';
import { getKeyEntry } from '../key-labels';
import { LogCallback, silentLog } from '../logging';
import {
  BestEffortSink,
  BestEffortStroke,
  DelayFn,
  ReplayStrategy,
  TierFailure,
  TierResult,
  sleep,
  toPlatformModifiers,
} from './types';

/**
 * Best-effort character for a key code. Unknown keys type a space.
 */
export function bestEffortChar(code: number): string {
  return getKeyEntry(code)?.char ?? ' ';
}

export interface BestEffortOptions {
  /** Delay after each key in ms (default: 100) */
  keyDelayMs?: number;
  /** Delay between down and up in ms (default: 50) */
  releaseDelayMs?: number;
  delay?: DelayFn;
  onLog?: LogCallback;
}

export class BestEffortStrategy implements ReplayStrategy {
  readonly tier = 'best-effort' as const;
  private sink: BestEffortSink;
  private keyDelayMs: number;
  private releaseDelayMs: number;
  private delay: DelayFn;
  private log: LogCallback;

  constructor(sink: BestEffortSink, options: BestEffortOptions = {}) {
    this.sink = sink;
    this.keyDelayMs = options.keyDelayMs ?? 100;
    this.releaseDelayMs = options.releaseDelayMs ?? 50;
    this.delay = options.delay ?? sleep;
    this.log = options.onLog ?? silentLog;
  }

  async attempt(sequence: readonly InputEvent[]): Promise<TierResult> {
    const failures: TierFailure[] = [];
    let delivered = 0;

    for (let index = 0; index < sequence.length; index++) {
      const event = sequence[index];
      if (!event.phase) {
        continue;
      }
      try {
        if (event.channel !== 'keyboard') {
          throw new UnsupportedInputError(`Best-effort replay cannot reproduce ${event.label}`);
        }
        const stroke: BestEffortStroke = {
          code: event.code,
          char: bestEffortChar(event.code),
          down: true,
          modifiers: toPlatformModifiers(event.modifierMask),
        };
        await this.sink.dispatch(stroke);
        await this.delay(this.releaseDelayMs);
        await this.sink.dispatch({ ...stroke, down: false });
        delivered++;
      } catch (error) {
        const message = errorMessage(error);
        this.log('warn', `Best-effort replay skipped ${event.label}: ${message}`);
        failures.push({
          index,
          code: errorCodeOf(error, REPLAY_ERROR_CODES.SYNTHESIS_FAILED),
          message,
        });
      }
      await this.delay(this.keyDelayMs);
    }

    // Fails only when something was attempted and nothing got through
    return { success: delivered > 0 || failures.length === 0, delivered, failures };
  }
}
