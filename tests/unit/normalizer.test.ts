/**
 * Unit tests for the event normalizer and modifier flags tracker
 */
import { describe, it, expect } from 'vitest';
import { ModifierFlagsTracker, modifierMaskFromFlags, normalize } from '@shared/index';

describe('normalize', () => {
  it('builds an event from a raw tuple', () => {
    const event = normalize({ channel: 'keyboard', code: 9, modifierMask: 8, phase: true, timestamp: 500 });
    expect(event.channel).toBe('keyboard');
    expect(event.code).toBe(9);
    expect(event.modifierMask).toBe(8);
    expect(event.phase).toBe(true);
    expect(event.label).toBe('V');
    expect(event.capturedAt).toBe(500);
  });

  it('produces identical labels for identical channel, code and phase', () => {
    const a = normalize({ channel: 'mouse', code: 2, modifierMask: 0, phase: false });
    const b = normalize({ channel: 'mouse', code: 2, modifierMask: 15, phase: false });
    expect(a.label).toBe(b.label);
    expect(a.label).toBe('Middle Click');
  });

  it('degrades unknown codes to generic labels', () => {
    expect(normalize({ channel: 'keyboard', code: 201, modifierMask: 0, phase: true }).label).toBe('Key 201');
  });
});

describe('modifierMaskFromFlags', () => {
  it('sets one bit per flag', () => {
    expect(modifierMaskFromFlags({ shift: true, control: false, option: false, command: false })).toBe(1);
    expect(modifierMaskFromFlags({ shift: false, control: true, option: true, command: false })).toBe(6);
    expect(modifierMaskFromFlags({ shift: true, control: true, option: true, command: true })).toBe(15);
  });
});

describe('ModifierFlagsTracker', () => {
  const none = { shift: false, control: false, option: false, command: false };

  it('emits one event per changed modifier', () => {
    const tracker = new ModifierFlagsTracker();
    const events = tracker.update({ ...none, command: true, shift: true }, 10);
    expect(events).toEqual([
      { channel: 'keyboard', code: 56, modifierMask: 0, phase: true, timestamp: 10 },
      { channel: 'keyboard', code: 55, modifierMask: 0, phase: true, timestamp: 10 },
    ]);
  });

  it('emits releases when flags clear', () => {
    const tracker = new ModifierFlagsTracker();
    tracker.update({ ...none, option: true });
    const events = tracker.update(none);
    expect(events.map(event => [event.code, event.phase])).toEqual([[58, false]]);
  });

  it('emits nothing when flags are unchanged', () => {
    const tracker = new ModifierFlagsTracker();
    tracker.update({ ...none, control: true });
    expect(tracker.update({ ...none, control: true })).toEqual([]);
  });

  it('tracks function and caps lock', () => {
    const tracker = new ModifierFlagsTracker();
    const events = tracker.update({ ...none, function: true, capsLock: true });
    expect(events.map(event => event.code)).toEqual([63, 57]);
  });

  it('forgets state on reset', () => {
    const tracker = new ModifierFlagsTracker();
    tracker.update({ ...none, shift: true });
    tracker.reset();
    expect(tracker.update({ ...none, shift: true }).map(event => event.code)).toEqual([56]);
  });
});
