/**
 * Tests for native-host/src/index.ts: request dispatch (handleMessage) and
 * notification forwarding
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  RequestMessage,
  RequestMessageType,
  ResponseMessage,
  createMacro,
  keyEvent,
  projectSteps,
} from '@shared/index';
import { Harness, createHarness } from '../utils/mocks';
import { flushPromises, keyPress, rawKey } from '../utils/test-helpers';

// The entry point loads the platform adapters; keep their native modules out
vi.mock('@nut-tree-fork/nut-js', () => ({
  keyboard: { config: {}, pressKey: vi.fn(), releaseKey: vi.fn(), type: vi.fn() },
  mouse: { config: {}, pressButton: vi.fn(), releaseButton: vi.fn() },
  Button: { LEFT: 0, MIDDLE: 1, RIGHT: 2 },
  Key: {},
}));
vi.mock('uiohook-napi', () => ({ uIOhook: { on: vi.fn(), off: vi.fn(), start: vi.fn(), stop: vi.fn() } }));
vi.mock('native-messaging', () => ({ default: vi.fn(() => vi.fn()) }));
vi.mock('electron-log/node', () => ({
  default: {
    scope: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
    transports: { file: {}, console: {} },
  },
}));

import { forwardNotifications, handleMessage, toWireMacro } from '@native-host/index';

function request(type: RequestMessageType, payload?: unknown): RequestMessage {
  return { type, id: 'req-1', timestamp: 1, payload };
}

let harness: Harness;

function send(type: RequestMessageType, payload?: unknown): Promise<ResponseMessage> {
  return handleMessage(request(type, payload), { controller: harness.controller, library: harness.library });
}

afterEach(() => {
  harness.controller.dispose();
});

describe('toWireMacro', () => {
  it('adds display strings to the stored record', () => {
    const keySequence = keyPress(8, 8);
    const macro = createMacro({
      name: 'Copy',
      keySequence,
      binding: keyEvent(11, true, 9),
      steps: projectSteps(keySequence),
    });
    harness = createHarness();

    const wire = toWireMacro(macro);

    expect(wire.id).toBe(macro.id);
    expect(wire.keySequence).toHaveLength(2);
    expect(wire.display).toEqual({ binding: '⇧⌘B', keys: 'C', steps: '⌘C' });
  });

  it('describes an empty macro', () => {
    harness = createHarness();
    expect(toWireMacro(createMacro()).display).toEqual({
      binding: 'Click to bind',
      keys: 'No keys recorded',
      steps: 'No steps',
    });
  });
});

describe('handleMessage', () => {
  beforeEach(() => {
    harness = createHarness();
  });

  it('answers ping with pong', async () => {
    const response = await send('ping');
    expect(response.type).toBe('pong');
    expect(response.id).toBe('req-1');
  });

  it('reports controller status', async () => {
    const response = await send('get_status');
    expect(response.type).toBe('result');
    expect(response.payload).toMatchObject({ started: false, isRecording: false, macroCount: 0 });
  });

  it('creates, lists, renames and deletes macros', async () => {
    const created = await send('create_macro', { name: 'Greeting' });
    expect(created.payload).toMatchObject({ macro: { name: 'Greeting' } });
    const [macro] = [...harness.store.macros.values()];

    const listed = await send('get_macros');
    expect(listed.payload).toMatchObject({ macros: [{ id: macro.id, name: 'Greeting' }] });

    const renamed = await send('rename_macro', { id: macro.id, name: 'Farewell' });
    expect(renamed.payload).toMatchObject({ macro: { name: 'Farewell' } });

    const deleted = await send('delete_macro', { id: macro.id });
    expect(deleted.payload).toEqual({ removed: true });
    expect(harness.store.macros.size).toBe(0);
  });

  it('validates required fields', async () => {
    expect(await send('rename_macro', { id: 'x' })).toMatchObject({ type: 'error', error: 'rename_macro needs id and name' });
    expect(await send('delete_macro')).toMatchObject({ type: 'error', error: 'delete_macro needs id' });
    expect(await send('bind_start', { id: 7 })).toMatchObject({ type: 'error', error: 'bind_start needs id' });
    expect(await send('execute_macro', null)).toMatchObject({ type: 'error', error: 'execute_macro needs id' });
  });

  it('reports unknown macro ids', async () => {
    expect(await send('rename_macro', { id: 'missing', name: 'N' })).toMatchObject({ error: 'Macro missing not found' });
    expect(await send('execute_macro', { id: 'missing' })).toMatchObject({ error: 'Macro missing not found' });
    expect(await send('record_start', { id: 'missing' })).toMatchObject({ error: 'Macro missing not found' });
  });

  it('records a new macro from start to stop', async () => {
    const started = await send('record_start', { name: 'Recorded' });
    expect(started.payload).toEqual({ recording: true, targetId: null });
    expect(await send('record_start')).toMatchObject({ type: 'error', error: 'Recording already in progress' });

    harness.controller.submit(rawKey(0, true));
    harness.controller.submit(rawKey(0, false));
    const stopped = await send('record_stop');

    expect(stopped.payload).toMatchObject({ macro: { name: 'Recorded', display: { keys: 'A', steps: 'A' } } });
    expect(harness.store.macros.size).toBe(1);
  });

  it('answers record_stop with a null macro when idle', async () => {
    expect((await send('record_stop')).payload).toEqual({ macro: null });
  });

  it('binds a macro to the next key press', async () => {
    const macro = createMacro();
    await harness.store.save(macro);

    const pending = send('bind_start', { id: macro.id });
    await flushPromises();
    harness.controller.submit(rawKey(11, true, 8));
    const response = await pending;

    expect(response.payload).toEqual({
      outcome: 'assigned',
      binding: { channel: 'keyboard', code: 11, modifierMask: 8, phase: true, label: 'B' },
      display: '⌘B',
    });
  });

  it('cancels binding capture', async () => {
    const macro = createMacro();
    await harness.store.save(macro);

    const pending = send('bind_start', { id: macro.id });
    await flushPromises();
    expect((await send('bind_cancel')).payload).toEqual({ cancelled: true });
    expect((await pending).payload).toEqual({ outcome: 'cancelled', binding: null, display: 'Click to bind' });
  });

  it('executes a macro, forcing past authorization when asked', async () => {
    const macro = createMacro({ keySequence: keyPress(9, 8) });
    await harness.store.save(macro);
    harness.authorization.authorized = false;

    expect((await send('execute_macro', { id: macro.id })).payload).toMatchObject({ status: 'unauthorized' });
    expect((await send('execute_macro', { id: macro.id, force: true })).payload).toMatchObject({
      status: 'completed',
      success: true,
    });
    expect(harness.sink.events).toHaveLength(2);
  });

  it('requests authorization', async () => {
    harness.authorization.authorized = false;
    harness.authorization.grantOnRequest = true;
    expect((await send('request_authorization')).payload).toEqual({ authorized: true });
  });

  it('turns store failures into error responses', async () => {
    harness.store.failFetch = true;
    expect(await send('get_macros')).toMatchObject({ type: 'error', id: 'req-1', error: 'store offline' });
  });
});

describe('forwardNotifications', () => {
  it('pushes recording, trigger and completion notifications', async () => {
    const bound = createMacro({ name: 'Paste', keySequence: keyPress(9, 8), binding: keyEvent(0, true) });
    harness = createHarness({ macros: [bound] });
    await harness.controller.start();
    const sent: ResponseMessage[] = [];
    const stop = forwardNotifications(harness.controller, message => sent.push(message));

    harness.controller.submit(rawKey(0, true));
    await harness.controller.whenIdle();

    expect(sent.map(message => message.type)).toEqual(['MACRO_TRIGGERED', 'MACRO_COMPLETE']);
    expect(sent[0].payload).toEqual({ id: bound.id, name: 'Paste', trigger: 'A' });
    expect(sent[1].payload).toMatchObject({ id: bound.id, success: true, tier: 'direct', errorCode: 0 });

    harness.controller.startRecording();
    harness.controller.submit(rawKey(8, true));
    expect(sent.slice(2).map(message => message.type)).toEqual(['STATUS_UPDATE', 'RECORDING_EVENT']);
    expect(sent[2].payload).toMatchObject({ event: 'recording-started', status: { isRecording: true } });
    expect(sent[3].payload).toEqual({
      event: { channel: 'keyboard', code: 8, modifierMask: 0, phase: true, label: 'C' },
    });

    stop();
    harness.controller.stopRecording();
    expect(sent).toHaveLength(4);
  });

  it('pushes replay errors', async () => {
    harness = createHarness({ authorized: false });
    const sent: ResponseMessage[] = [];
    forwardNotifications(harness.controller, message => sent.push(message));
    const macro = createMacro({ keySequence: keyPress(0) });

    await harness.controller.executeMacro(macro);

    expect(sent).toHaveLength(1);
    expect(sent[0].type).toBe('MACRO_ERROR');
    expect(sent[0].payload).toMatchObject({ code: -340, macroId: macro.id });
  });
});
