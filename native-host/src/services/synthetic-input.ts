/**
 * Synthetic Input Service for the keyreel native host
 * OS-level key and mouse button events through nut.js, for the direct
 * (tier 1) and best-effort (tier 3) replay paths
 */
import { keyboard, mouse, Button, Key } from '@nut-tree-fork/nut-js';
import {
  BestEffortSink,
  BestEffortStroke,
  PlatformModifier,
  SynthesisError,
  SyntheticEvent,
  SyntheticInputSink,
  UnsupportedInputError,
  errorMessage,
  getKeyTable,
  isModifierKeyCode,
} from '../../../shared/src/index';

/**
 * nut.js Key values by enum member name
 */
const NUT_KEYS = new Map<string, Key>(
  Object.entries(Key).filter((entry): entry is [string, Key] => typeof entry[1] === 'number')
);

/**
 * nut.js key for each virtual key code in the key table
 */
const KEYS_BY_CODE = new Map<number, Key>();
for (const entry of getKeyTable()) {
  const key = entry.nut === undefined ? undefined : NUT_KEYS.get(entry.nut);
  if (key !== undefined) {
    KEYS_BY_CODE.set(entry.code, key);
  }
}

const MODIFIER_KEYS: Record<PlatformModifier, Key> = {
  shift: Key.LeftShift,
  control: Key.LeftControl,
  option: Key.LeftAlt,
  command: Key.LeftSuper,
};

/**
 * nut.js key for a virtual key code
 */
export function toNutKey(code: number): Key | undefined {
  return KEYS_BY_CODE.get(code);
}

/**
 * Convert a recorded mouse button to a nut.js Button
 */
export function toNutButton(button: number): Button {
  switch (button) {
    case 0:
      return Button.LEFT;
    case 1:
      return Button.RIGHT;
    case 2:
      return Button.MIDDLE;
    default:
      throw new UnsupportedInputError(`Unsupported mouse button: ${button}`);
  }
}

function modifierKeys(modifiers: PlatformModifier[], exclude?: Key): Key[] {
  return modifiers.map(modifier => MODIFIER_KEYS[modifier]).filter(key => key !== exclude);
}

/**
 * Turn off nut.js's built-in pause after each action; the replay
 * strategies own the timing.
 */
export function disableAutoDelay(): void {
  keyboard.config.autoDelayMs = 0;
  mouse.config.autoDelayMs = 0;
}

/**
 * Tier 1 sink. A down presses the held modifiers and then the key; an up
 * releases the key and then the modifiers. A modifier key is posted on its
 * own, since its mask reflects the key itself and differs between phases.
 */
export class NutSyntheticInputSink implements SyntheticInputSink {
  /** Keys pressed and not yet released, in press order */
  private held = new Set<Key>();

  async post(event: SyntheticEvent): Promise<void> {
    if (event.channel === 'mouse') {
      await this.postMouse(event);
      return;
    }

    const key = toNutKey(event.code);
    if (key === undefined) {
      throw new SynthesisError(`No synthetic key for key code ${event.code}`);
    }
    const modifiers = isModifierKeyCode(event.code) ? [] : modifierKeys(event.modifiers, key);

    try {
      if (event.down) {
        await this.press([...modifiers, key]);
      } else {
        await this.release([key, ...modifiers]);
      }
    } catch (error) {
      throw new SynthesisError(`Key event ${event.code} failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Release every key still held, most recent first
   */
  async releaseAll(): Promise<void> {
    const keys = [...this.held].reverse();
    if (keys.length === 0) {
      return;
    }
    try {
      await this.release(keys);
    } catch (error) {
      throw new SynthesisError(`Releasing held keys failed: ${errorMessage(error)}`);
    }
  }

  getHeldKeys(): Key[] {
    return [...this.held];
  }

  private async press(keys: Key[]): Promise<void> {
    await keyboard.pressKey(...keys);
    for (const key of keys) {
      this.held.add(key);
    }
  }

  private async release(keys: Key[]): Promise<void> {
    for (const key of keys) {
      this.held.delete(key);
    }
    await keyboard.releaseKey(...keys);
  }

  private async postMouse(event: SyntheticEvent): Promise<void> {
    const button = toNutButton(event.code);
    const modifiers = modifierKeys(event.modifiers);

    try {
      if (event.down) {
        if (modifiers.length > 0) {
          await this.press(modifiers);
        }
        await mouse.pressButton(button);
      } else {
        await mouse.releaseButton(button);
        if (modifiers.length > 0) {
          await this.release(modifiers);
        }
      }
    } catch (error) {
      throw new SynthesisError(`Mouse event ${event.code} failed: ${errorMessage(error)}`);
    }
  }
}

/**
 * Tier 3 sink. The down stroke types the mapped character; the up stroke
 * has nothing left to release.
 */
export class NutBestEffortSink implements BestEffortSink {
  async dispatch(stroke: BestEffortStroke): Promise<void> {
    if (!stroke.down) {
      return;
    }
    try {
      await keyboard.type(stroke.char);
    } catch (error) {
      throw new SynthesisError(`Typing ${JSON.stringify(stroke.char)} failed: ${errorMessage(error)}`);
    }
  }
}
