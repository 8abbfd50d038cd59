/**
 * Global input capture through uiohook-napi
 *
 * uiohook reports keys as its own scan codes and mouse buttons from 1; both
 * are translated into the virtual key code space and zero-based buttons
 * used by the core. Keys missing from the key table are dropped.
 */
import { uIOhook, UiohookKeyboardEvent, UiohookMouseEvent } from 'uiohook-napi';
import {
  CaptureListener,
  CaptureSource,
  LogCallback,
  RawInputEvent,
  keyCodeFromUiohook,
  modifierMaskFromFlags,
  silentLog,
} from '../../../shared/src/index';

interface ModifierState {
  shiftKey: boolean;
  ctrlKey: boolean;
  altKey: boolean;
  metaKey: boolean;
}

function maskOf(event: ModifierState): number {
  return modifierMaskFromFlags({
    shift: event.shiftKey,
    control: event.ctrlKey,
    option: event.altKey,
    command: event.metaKey,
  });
}

/**
 * Translate a uiohook keyboard event, or null for an unmapped key
 */
export function fromKeyboardEvent(event: UiohookKeyboardEvent, down: boolean): RawInputEvent | null {
  const code = keyCodeFromUiohook(event.keycode);
  if (code === undefined) {
    return null;
  }
  return { channel: 'keyboard', code, modifierMask: maskOf(event), phase: down, timestamp: Date.now() };
}

/**
 * Translate a uiohook mouse event (buttons 1..n become 0..n-1)
 */
export function fromMouseEvent(event: UiohookMouseEvent, down: boolean): RawInputEvent | null {
  if (typeof event.button !== 'number' || event.button < 1) {
    return null;
  }
  return { channel: 'mouse', code: event.button - 1, modifierMask: maskOf(event), phase: down, timestamp: Date.now() };
}

export class UiohookCaptureSource implements CaptureSource {
  private listener: CaptureListener | null = null;
  private log: LogCallback;

  constructor(onLog: LogCallback = silentLog) {
    this.log = onLog;
  }

  private onKeyDown = (event: UiohookKeyboardEvent): void => this.forward(fromKeyboardEvent(event, true), event.keycode);
  private onKeyUp = (event: UiohookKeyboardEvent): void => this.forward(fromKeyboardEvent(event, false), event.keycode);
  private onMouseDown = (event: UiohookMouseEvent): void => this.forward(fromMouseEvent(event, true), -1);
  private onMouseUp = (event: UiohookMouseEvent): void => this.forward(fromMouseEvent(event, false), -1);

  start(listener: CaptureListener): void {
    if (this.listener) {
      this.listener = listener;
      return;
    }
    this.listener = listener;
    uIOhook.on('keydown', this.onKeyDown);
    uIOhook.on('keyup', this.onKeyUp);
    uIOhook.on('mousedown', this.onMouseDown);
    uIOhook.on('mouseup', this.onMouseUp);
    try {
      uIOhook.start();
    } catch (error) {
      this.detach();
      throw error;
    }
    this.log('info', 'Global input capture started');
  }

  stop(): void {
    if (!this.listener) {
      return;
    }
    this.detach();
    uIOhook.stop();
    this.log('info', 'Global input capture stopped');
  }

  private detach(): void {
    uIOhook.off('keydown', this.onKeyDown);
    uIOhook.off('keyup', this.onKeyUp);
    uIOhook.off('mousedown', this.onMouseDown);
    uIOhook.off('mouseup', this.onMouseUp);
    this.listener = null;
  }

  private forward(raw: RawInputEvent | null, sourceCode: number): void {
    if (!raw) {
      this.log('debug', `Ignoring unmapped input ${sourceCode}`);
      return;
    }
    this.listener?.(raw);
  }
}
