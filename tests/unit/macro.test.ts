/**
 * Unit tests for the Macro model
 */
import { describe, it, expect } from 'vitest';
import {
  DEFAULT_MACRO_NAME,
  MacroDataError,
  createMacro,
  decodeMacro,
  encodeMacro,
  isSameInput,
  keyEvent,
  mouseEvent,
  projectSteps,
  renameMacro,
  sortMacrosNewestFirst,
} from '@shared/index';

describe('createMacro', () => {
  it('creates an empty macro with the default name', () => {
    const macro = createMacro();
    expect(macro.name).toBe(DEFAULT_MACRO_NAME);
    expect(macro.name).toBe('New Macro');
    expect(macro.keySequence).toEqual([]);
    expect(macro.binding).toBeNull();
    expect(macro.steps).toEqual([]);
    expect(macro.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('falls back to the default name for a blank one', () => {
    expect(createMacro({ name: '' }).name).toBe(DEFAULT_MACRO_NAME);
    expect(createMacro({ name: ' \t' }).name).toBe(DEFAULT_MACRO_NAME);
    expect(createMacro({ name: ' Padded ' }).name).toBe(' Padded ');
  });

  it('copies the given sequence', () => {
    const sequence = [keyEvent(0, true)];
    const macro = createMacro({ keySequence: sequence });
    sequence.push(keyEvent(0, false));
    expect(macro.keySequence).toHaveLength(1);
  });
});

describe('renameMacro', () => {
  it('applies a new name', () => {
    const macro = createMacro({ name: 'Old' });
    const result = renameMacro(macro, 'New');
    expect(result.changed).toBe(true);
    expect(result.macro.name).toBe('New');
    expect(macro.name).toBe('Old');
  });

  it('discards empty names', () => {
    const macro = createMacro({ name: 'Keep' });
    expect(renameMacro(macro, '')).toEqual({ macro, changed: false });
    expect(renameMacro(macro, '   ')).toEqual({ macro, changed: false });
  });

  it('reports no change for the same name', () => {
    const macro = createMacro({ name: 'Same' });
    expect(renameMacro(macro, 'Same').changed).toBe(false);
  });
});

describe('sortMacrosNewestFirst', () => {
  it('orders by creation time descending', () => {
    const older = createMacro({ name: 'older', createdAt: 1000 });
    const newer = createMacro({ name: 'newer', createdAt: 2000 });
    expect(sortMacrosNewestFirst([older, newer]).map(m => m.name)).toEqual(['newer', 'older']);
  });
});

describe('projectSteps', () => {
  it('derives one step per down event', () => {
    const steps = projectSteps([keyEvent(8, true, 8), keyEvent(8, false, 8), mouseEvent(1, true), mouseEvent(1, false)]);
    expect(steps.map(step => ({ type: step.type, keyCode: step.keyCode, modifiers: step.modifiers }))).toEqual([
      { type: 'key', keyCode: 8, modifiers: 8 },
      { type: 'mouse', keyCode: 1, modifiers: 0 },
    ]);
  });
});

describe('encodeMacro / decodeMacro', () => {
  it('round-trips the durable fields', () => {
    const macro = createMacro({
      name: 'Copy',
      keySequence: [keyEvent(8, true, 8), keyEvent(8, false, 8)],
      binding: keyEvent(96, true),
      createdAt: Date.UTC(2024, 0, 2, 3, 4, 5),
    });
    const record = encodeMacro(macro);
    expect(record.createdAt).toBe('2024-01-02T03:04:05.000Z');

    const decoded = decodeMacro(JSON.parse(JSON.stringify(record)));
    expect(decoded.id).toBe(macro.id);
    expect(decoded.name).toBe('Copy');
    expect(decoded.createdAt).toBe(macro.createdAt);
    expect(decoded.keySequence).toHaveLength(2);
    expect(isSameInput(decoded.keySequence[0], macro.keySequence[0])).toBe(true);
    expect(decoded.binding?.code).toBe(96);
  });

  it('accepts a record without binding or steps', () => {
    const decoded = decodeMacro({ id: 'm1', name: 'n', keySequence: [], createdAt: '2024-05-01T00:00:00.000Z' });
    expect(decoded.binding).toBeNull();
    expect(decoded.steps).toEqual([]);
  });

  it('drops malformed steps', () => {
    const decoded = decodeMacro({
      id: 'm1',
      name: 'n',
      keySequence: [],
      createdAt: '2024-05-01T00:00:00.000Z',
      steps: [{ id: 's1', type: 'delay', modifiers: 0, delay: 2 }, { id: 's2', type: 'jump', modifiers: 0 }],
    });
    expect(decoded.steps).toEqual([{ id: 's1', type: 'delay', modifiers: 0, delay: 2 }]);
  });

  it('rejects invalid records', () => {
    expect(() => decodeMacro('macro')).toThrow(MacroDataError);
    expect(() => decodeMacro({ name: 'n', keySequence: [], createdAt: '2024-05-01T00:00:00.000Z' })).toThrow('missing its id');
    expect(() => decodeMacro({ id: 'm', name: 'n', keySequence: [], createdAt: 'yesterday' })).toThrow('invalid creation time');
    expect(() => decodeMacro({ id: 'm', name: 'n', keySequence: [{}], createdAt: '2024-05-01T00:00:00.000Z' })).toThrow(MacroDataError);
  });
});
