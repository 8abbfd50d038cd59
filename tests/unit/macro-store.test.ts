/**
 * Tests for the JSON file macro store
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MacroStoreError, createMacro, encodeMacro, keyEvent } from '@shared/index';
import { JsonFileMacroStore, STORE_VERSION, defaultStorePath } from '@native-host/services/macro-store';
import { createLogCollector, keyPress } from '../utils/test-helpers';

let tmpDir: string;
let storePath: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'keyreel-store-test-'));
  storePath = path.join(tmpDir, 'nested', 'macros.json');
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function readDocument(): { version: number; macros: Array<{ id: string; name: string }> } {
  return JSON.parse(fs.readFileSync(storePath, 'utf8'));
}

describe('defaultStorePath', () => {
  it('lives under the keyreel directory', () => {
    expect(defaultStorePath('/home/test')).toBe(path.join('/home/test', '.keyreel', 'macros.json'));
  });
});

describe('JsonFileMacroStore', () => {
  it('starts empty when the file does not exist', async () => {
    const store = new JsonFileMacroStore(storePath);
    expect(await store.fetchAll()).toEqual([]);
    expect(await store.get('anything')).toBeNull();
  });

  it('saves and reloads macros with their sequence and binding', async () => {
    const macro = createMacro({
      name: 'Copy',
      keySequence: keyPress(8, 8),
      binding: keyEvent(0, true, 8),
      createdAt: Date.parse('2026-01-02T03:04:05.000Z'),
    });
    await new JsonFileMacroStore(storePath).save(macro);

    const loaded = await new JsonFileMacroStore(storePath).get(macro.id);

    expect(loaded).not.toBeNull();
    expect(loaded ? encodeMacro(loaded) : null).toEqual(encodeMacro(macro));
    expect(readDocument().version).toBe(STORE_VERSION);
  });

  it('replaces a macro saved again under the same id', async () => {
    const store = new JsonFileMacroStore(storePath);
    const macro = createMacro({ name: 'First' });
    await store.save(macro);
    await store.save({ ...macro, name: 'Second' });

    expect(readDocument().macros.map(m => m.name)).toEqual(['Second']);
  });

  it('returns macros newest first', async () => {
    const store = new JsonFileMacroStore(storePath);
    await store.save(createMacro({ name: 'Old', createdAt: 1000 }));
    await store.save(createMacro({ name: 'New', createdAt: 3000 }));
    await store.save(createMacro({ name: 'Middle', createdAt: 2000 }));

    expect((await store.fetchAll()).map(m => m.name)).toEqual(['New', 'Middle', 'Old']);
  });

  it('removes macros and reports whether one was found', async () => {
    const store = new JsonFileMacroStore(storePath);
    const macro = createMacro();
    await store.save(macro);

    expect(await store.remove(macro.id)).toBe(true);
    expect(await store.remove(macro.id)).toBe(false);
    expect(await store.fetchAll()).toEqual([]);
  });

  it('keeps every save when writes overlap', async () => {
    const store = new JsonFileMacroStore(storePath);
    const macros = [createMacro({ name: 'A' }), createMacro({ name: 'B' }), createMacro({ name: 'C' })];

    await Promise.all(macros.map(macro => store.save(macro)));

    expect((await store.fetchAll()).map(m => m.name).sort()).toEqual(['A', 'B', 'C']);
  });

  it('skips records that cannot be decoded', async () => {
    const good = createMacro({ name: 'Good' });
    fs.mkdirSync(path.dirname(storePath), { recursive: true });
    fs.writeFileSync(storePath, JSON.stringify({ version: 1, macros: [encodeMacro(good), { id: 'broken' }] }));
    const logs = createLogCollector();

    const macros = await new JsonFileMacroStore(storePath, logs.onLog).fetchAll();

    expect(macros.map(m => m.id)).toEqual([good.id]);
    expect(logs.messages('warn')).toEqual(['Skipping invalid macro record: Macro broken is missing its name']);
  });

  it('fails on a malformed document', async () => {
    fs.mkdirSync(path.dirname(storePath), { recursive: true });
    fs.writeFileSync(storePath, '{"version": 1}');
    const store = new JsonFileMacroStore(storePath);

    await expect(store.fetchAll()).rejects.toThrow(MacroStoreError);
    await expect(store.fetchAll()).rejects.toThrow('missing macros list');
  });

  it('fails on invalid JSON', async () => {
    fs.mkdirSync(path.dirname(storePath), { recursive: true });
    fs.writeFileSync(storePath, 'not json');
    await expect(new JsonFileMacroStore(storePath).fetchAll()).rejects.toThrow(`Malformed macro store ${storePath}`);
  });

  it('keeps accepting writes after a failed one', async () => {
    fs.mkdirSync(path.dirname(storePath), { recursive: true });
    fs.writeFileSync(storePath, 'not json');
    const store = new JsonFileMacroStore(storePath);

    await expect(store.save(createMacro())).rejects.toThrow(MacroStoreError);

    fs.writeFileSync(storePath, JSON.stringify({ version: 1, macros: [] }));
    await store.save(createMacro({ name: 'After' }));
    expect((await store.fetchAll()).map(m => m.name)).toEqual(['After']);
  });
});
