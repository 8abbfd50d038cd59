/**
 * Tier 2: scripted keystroke automation
 *
 * Re-derives keystrokes from the recorded sequence and issues one
 * System Events instruction per keystroke. Unlike tier 1 a failed action
 * does not stop the remaining ones, but the tier only succeeds when every
 * action does.
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
  PlatformModifier,
  ReplayStrategy,
  ScriptRunner,
  TierFailure,
  TierResult,
  toPlatformModifiers,
} from './types';

/**
 * A down event and the release that completes it
 */
export interface Keystroke {
  /** Index of the down event in the sequence */
  index: number;
  press: InputEvent;
  /** Nearest following up of the same input, null for an orphaned down */
  release: InputEvent | null;
}

/**
 * Pair every down event with the nearest following, not yet paired, up
 * event of the same channel and code.
 */
export function deriveKeystrokes(sequence: readonly InputEvent[]): Keystroke[] {
  const keystrokes: Keystroke[] = [];
  const paired = new Set<number>();

  sequence.forEach((event, index) => {
    if (!event.phase) {
      return;
    }
    let releaseIndex = -1;
    for (let j = index + 1; j < sequence.length; j++) {
      const candidate = sequence[j];
      if (
        !candidate.phase &&
        !paired.has(j) &&
        candidate.channel === event.channel &&
        candidate.code === event.code
      ) {
        releaseIndex = j;
        break;
      }
    }
    if (releaseIndex !== -1) {
      paired.add(releaseIndex);
    }
    keystrokes.push({
      index,
      press: event,
      release: releaseIndex === -1 ? null : sequence[releaseIndex],
    });
  });

  return keystrokes;
}

const APPLESCRIPT_MODIFIERS: Record<PlatformModifier, string> = {
  shift: 'shift down',
  control: 'control down',
  option: 'option down',
  command: 'command down',
};

function quoteAppleScript(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function isPrintable(char: string): boolean {
  if (char.length !== 1) return false;
  const codePoint = char.charCodeAt(0);
  return codePoint >= 0x20 && codePoint !== 0x7f;
}

/**
 * Build the System Events script for one keystroke.
 * Printable keys are typed by character; everything else by key code.
 */
export function buildKeystrokeScript(keystroke: Keystroke): string {
  const { press } = keystroke;
  if (press.channel !== 'keyboard') {
    throw new UnsupportedInputError(`No scripted equivalent for ${press.label}`);
  }

  const char = getKeyEntry(press.code)?.char;
  const action = char !== undefined && isPrintable(char)
    ? `keystroke ${quoteAppleScript(char)}`
    : `key code ${press.code}`;

  const modifiers = toPlatformModifiers(press.modifierMask).map(m => APPLESCRIPT_MODIFIERS[m]);
  const using = modifiers.length > 0 ? ` using {${modifiers.join(', ')}}` : '';

  return `tell application "System Events" to ${action}${using}`;
}

export interface ScriptedKeystrokeOptions {
  onLog?: LogCallback;
}

export class ScriptedKeystrokeStrategy implements ReplayStrategy {
  readonly tier = 'scripted' as const;
  private runner: ScriptRunner;
  private log: LogCallback;

  constructor(runner: ScriptRunner, options: ScriptedKeystrokeOptions = {}) {
    this.runner = runner;
    this.log = options.onLog ?? silentLog;
  }

  async attempt(sequence: readonly InputEvent[]): Promise<TierResult> {
    const failures: TierFailure[] = [];
    let delivered = 0;

    for (const keystroke of deriveKeystrokes(sequence)) {
      try {
        await this.runner.run(buildKeystrokeScript(keystroke));
        delivered++;
        this.log('debug', `Scripted keystroke for ${keystroke.press.label}`);
      } catch (error) {
        const message = errorMessage(error);
        this.log('error', `Scripted keystroke failed for ${keystroke.press.label}: ${message}`);
        failures.push({
          index: keystroke.index,
          code: errorCodeOf(error, REPLAY_ERROR_CODES.AUTOMATION_FAILED),
          message,
        });
      }
    }

    return { success: failures.length === 0, delivered, failures };
  }
}
