/**
 * Tests for uiohook-based global capture
 */
import { describe, it, expect, vi } from 'vitest';
import type { RawInputEvent } from '@shared/index';

const hook = vi.hoisted(() => ({
  on: vi.fn(),
  off: vi.fn(),
  start: vi.fn(),
  stop: vi.fn(),
}));

vi.mock('uiohook-napi', () => ({
  uIOhook: hook,
  EventType: { EVENT_KEY_PRESSED: 4, EVENT_KEY_RELEASED: 5, EVENT_MOUSE_PRESSED: 7, EVENT_MOUSE_RELEASED: 8 },
}));

import { EventType, UiohookKeyboardEvent, UiohookMouseEvent } from 'uiohook-napi';

import { UiohookCaptureSource, fromKeyboardEvent, fromMouseEvent } from '@native-host/services/capture-service';
import { createLogCollector } from '../utils/test-helpers';

function keyboardEvent(keycode: number, modifiers: Partial<Pick<UiohookKeyboardEvent, 'shiftKey' | 'ctrlKey' | 'altKey' | 'metaKey'>> = {}): UiohookKeyboardEvent {
  return {
    type: EventType.EVENT_KEY_PRESSED,
    time: 0,
    keycode,
    shiftKey: false,
    ctrlKey: false,
    altKey: false,
    metaKey: false,
    ...modifiers,
  };
}

function mouseButtonEvent(button: unknown): UiohookMouseEvent {
  return {
    type: EventType.EVENT_MOUSE_PRESSED,
    time: 0,
    x: 10,
    y: 20,
    button,
    clicks: 1,
    shiftKey: false,
    ctrlKey: false,
    altKey: false,
    metaKey: false,
  };
}

function handlerFor(event: string): (payload: UiohookKeyboardEvent | UiohookMouseEvent) => void {
  const call = hook.on.mock.calls.find(([name]) => name === event);
  if (!call) {
    throw new Error(`no ${event} handler registered`);
  }
  return call[1];
}

describe('fromKeyboardEvent', () => {
  it('translates scan codes and modifier flags', () => {
    const raw = fromKeyboardEvent(keyboardEvent(46, { metaKey: true, shiftKey: true }), true);
    expect(raw).toMatchObject({ channel: 'keyboard', code: 8, modifierMask: 9, phase: true });
  });

  it('drops keys missing from the key table', () => {
    expect(fromKeyboardEvent(keyboardEvent(9999), false)).toBeNull();
  });
});

describe('fromMouseEvent', () => {
  it('numbers buttons from zero', () => {
    expect(fromMouseEvent(mouseButtonEvent(1), true)).toMatchObject({ channel: 'mouse', code: 0, phase: true });
    expect(fromMouseEvent(mouseButtonEvent(2), false)).toMatchObject({ channel: 'mouse', code: 1, phase: false });
  });

  it('ignores events without a button', () => {
    expect(fromMouseEvent(mouseButtonEvent(0), true)).toBeNull();
    expect(fromMouseEvent(mouseButtonEvent(undefined), true)).toBeNull();
  });
});

describe('UiohookCaptureSource', () => {
  it('forwards translated events to the listener', () => {
    const received: RawInputEvent[] = [];
    const source = new UiohookCaptureSource();
    source.start(raw => received.push(raw));

    expect(hook.start).toHaveBeenCalledTimes(1);
    handlerFor('keydown')(keyboardEvent(30));
    handlerFor('keyup')(keyboardEvent(30));
    handlerFor('mousedown')(mouseButtonEvent(2));

    expect(received.map(raw => [raw.channel, raw.code, raw.phase])).toEqual([
      ['keyboard', 0, true],
      ['keyboard', 0, false],
      ['mouse', 1, true],
    ]);
    source.stop();
  });

  it('logs unmapped keys at debug level', () => {
    const logs = createLogCollector();
    const received: RawInputEvent[] = [];
    const source = new UiohookCaptureSource(logs.onLog);
    source.start(raw => received.push(raw));

    handlerFor('keydown')(keyboardEvent(9999));

    expect(received).toEqual([]);
    expect(logs.messages('debug')).toEqual(['Ignoring unmapped input 9999']);
    source.stop();
  });

  it('detaches its handlers and stops the hook', () => {
    const source = new UiohookCaptureSource();
    source.start(() => {});
    source.stop();
    source.stop();

    expect(hook.off).toHaveBeenCalledTimes(4);
    expect(hook.stop).toHaveBeenCalledTimes(1);
  });

  it('detaches when the hook cannot start', () => {
    hook.start.mockImplementationOnce(() => {
      throw new Error('accessibility denied');
    });
    const source = new UiohookCaptureSource();

    expect(() => source.start(() => {})).toThrow('accessibility denied');
    expect(hook.off).toHaveBeenCalledTimes(4);
    source.stop();
    expect(hook.stop).not.toHaveBeenCalled();
  });
});
