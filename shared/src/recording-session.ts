/**
 * Recording Session
 *
 * Buffers a live stream of InputEvents into a candidate macro.
 *
 *   idle --start()--> recording --stop()--> idle
 *
 * start() while recording is a no-op and keeps the buffer; stop() while idle
 * returns null.
 */

import { InputEvent, isPrimaryMouseDown } from './input-event';
import { DEFAULT_MACRO_NAME, Macro, createMacro, resolveMacroName } from './macro';

export type RecordingState = 'idle' | 'recording';

/**
 * Live-edit callback, invoked synchronously for every buffered event
 */
export type RecordedEventCallback = (event: InputEvent) => void;

/**
 * Options for starting a session
 */
export interface RecordingStartOptions {
  /** Name given to the resulting macro */
  name?: string;
  /** Called for every buffered event */
  onEvent?: RecordedEventCallback;
}

/**
 * Result of stopping a session
 */
export interface RecordingStopResult {
  /** The new macro, or null when nothing usable was recorded */
  macro: Macro | null;
  /** Whether a trailing primary click was dropped */
  trimmedClick: boolean;
}

export class RecordingSession {
  private state: RecordingState = 'idle';
  private buffer: InputEvent[] = [];
  private name = DEFAULT_MACRO_NAME;
  private onEvent: RecordedEventCallback | undefined;

  getState(): RecordingState {
    return this.state;
  }

  isRecording(): boolean {
    return this.state === 'recording';
  }

  /**
   * Events buffered so far
   */
  getBuffer(): readonly InputEvent[] {
    return this.buffer;
  }

  /**
   * Begin recording. Returns false (and changes nothing) if already recording.
   */
  start(options: RecordingStartOptions = {}): boolean {
    if (this.state !== 'idle') {
      return false;
    }
    this.buffer = [];
    this.name = resolveMacroName(options.name);
    this.onEvent = options.onEvent;
    this.state = 'recording';
    return true;
  }

  /**
   * Buffer one event. Ignored unless recording.
   */
  append(event: InputEvent): boolean {
    if (this.state !== 'recording') {
      return false;
    }
    this.buffer.push(event);
    this.onEvent?.(event);
    return true;
  }

  /**
   * End recording and build the macro.
   *
   * A trailing primary-button down is the click that ended recording from
   * the UI and is dropped.
   */
  stop(): RecordingStopResult {
    if (this.state !== 'recording') {
      return { macro: null, trimmedClick: false };
    }
    this.state = 'idle';
    this.onEvent = undefined;

    const events = [...this.buffer];
    const last = events[events.length - 1];
    const trimmedClick = last !== undefined && isPrimaryMouseDown(last);
    if (trimmedClick) {
      events.pop();
    }
    this.buffer = [];

    if (events.length === 0) {
      return { macro: null, trimmedClick };
    }
    return {
      macro: createMacro({ name: this.name, keySequence: events }),
      trimmedClick,
    };
  }
}
