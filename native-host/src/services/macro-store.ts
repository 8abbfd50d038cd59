/**
 * JSON file macro store
 *
 * All macros live in one JSON document:
 *
 *   { "version": 1, "macros": [MacroRecord, ...] }
 *
 * Writes go to a temporary file that is then renamed over the document, and
 * are serialized so that two saves never interleave. Records that fail to
 * decode are skipped with a warning and dropped on the next write.
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  LogCallback,
  Macro,
  MacroRecord,
  MacroStore,
  MacroStoreError,
  decodeMacro,
  encodeMacro,
  errorMessage,
  silentLog,
  sortMacrosNewestFirst,
} from '../../../shared/src/index';

export const STORE_VERSION = 1;

interface StoreDocument {
  version: number;
  macros: MacroRecord[];
}

/**
 * Default location of the macro document
 */
export function defaultStorePath(home: string = os.homedir()): string {
  return path.join(home, '.keyreel', 'macros.json');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class JsonFileMacroStore implements MacroStore {
  readonly filePath: string;
  private log: LogCallback;
  private writes: Promise<void> = Promise.resolve();

  constructor(filePath: string = defaultStorePath(), onLog: LogCallback = silentLog) {
    this.filePath = filePath;
    this.log = onLog;
  }

  async fetchAll(): Promise<Macro[]> {
    await this.writes;
    return sortMacrosNewestFirst(await this.readMacros());
  }

  async get(id: string): Promise<Macro | null> {
    const macros = await this.fetchAll();
    return macros.find(macro => macro.id === id) ?? null;
  }

  async save(macro: Macro): Promise<void> {
    await this.mutate(macros => {
      const index = macros.findIndex(existing => existing.id === macro.id);
      if (index === -1) {
        return [...macros, macro];
      }
      const next = [...macros];
      next[index] = macro;
      return next;
    });
  }

  async remove(id: string): Promise<boolean> {
    let removed = false;
    await this.mutate(macros => {
      const next = macros.filter(macro => macro.id !== id);
      removed = next.length !== macros.length;
      return next;
    });
    return removed;
  }

  private mutate(change: (macros: Macro[]) => Macro[]): Promise<void> {
    const write = this.writes.then(async () => {
      const macros = await this.readMacros();
      await this.writeMacros(change(macros));
    });
    // A failed write must not block the ones queued after it
    this.writes = write.catch(() => undefined);
    return write;
  }

  private async readMacros(): Promise<Macro[]> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw new MacroStoreError(`Cannot read ${this.filePath}: ${errorMessage(error)}`);
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw new MacroStoreError(`Malformed macro store ${this.filePath}: ${errorMessage(error)}`);
    }
    if (typeof document !== 'object' || document === null || !('macros' in document) || !Array.isArray(document.macros)) {
      throw new MacroStoreError(`Malformed macro store ${this.filePath}: missing macros list`);
    }

    const records: unknown[] = document.macros;
    const macros: Macro[] = [];
    for (const record of records) {
      try {
        macros.push(decodeMacro(record));
      } catch (error) {
        this.log('warn', `Skipping invalid macro record: ${errorMessage(error)}`);
      }
    }
    return macros;
  }

  private async writeMacros(macros: Macro[]): Promise<void> {
    const document: StoreDocument = {
      version: STORE_VERSION,
      macros: sortMacrosNewestFirst(macros).map(encodeMacro),
    };
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(tempPath, JSON.stringify(document, null, 2), 'utf8');
      await fs.promises.rename(tempPath, this.filePath);
    } catch (error) {
      throw new MacroStoreError(`Cannot write ${this.filePath}: ${errorMessage(error)}`);
    }
  }
}
