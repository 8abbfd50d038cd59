/**
 * Macro Library
 *
 * The list and row operations of the macro manager: create, rename, delete,
 * record (into an existing macro or as a new one), bind and execute. Every
 * mutation goes to the store and then refreshes the controller cache.
 */

import { BindingResult, ExecuteResult, MacroController } from './controller';
import { errorMessage } from './errors';
import { InputEvent } from './input-event';
import { MacroStore } from './interfaces';
import { LogCallback, silentLog } from './logging';
import { Macro, createMacro, projectSteps, renameMacro, sortMacrosNewestFirst } from './macro';
import { RecordingStopResult } from './recording-session';
import { DEFAULT_SETTINGS, Settings } from './settings';

/**
 * A recording in progress
 */
export interface RecordingRun {
  /** Id of the macro being recorded into, null for a new macro */
  readonly targetId: string | null;
  /** Resolves with the stored macro once recording ends */
  readonly finished: Promise<Macro | null>;
  /** Stop now. Safe to call more than once. */
  stop(): Promise<Macro | null>;
}

export interface RecordOptions {
  /** Stop automatically after this many ms */
  autoStopMs?: number;
}

export interface BindOptions {
  /** Cancel binding capture after this many ms */
  timeoutMs?: number;
}

export interface MacroLibraryOptions {
  settings?: Settings;
  onLog?: LogCallback;
}

export class MacroLibrary {
  private controller: MacroController;
  private store: MacroStore;
  private settings: Settings;
  private log: LogCallback;
  private activeRun: RecordingRun | null = null;

  constructor(controller: MacroController, store: MacroStore, options: MacroLibraryOptions = {}) {
    this.controller = controller;
    this.store = store;
    this.settings = options.settings ?? { ...DEFAULT_SETTINGS };
    this.log = options.onLog ?? silentLog;
  }

  /**
   * All macros, newest first
   */
  async list(): Promise<Macro[]> {
    return sortMacrosNewestFirst(await this.store.fetchAll());
  }

  async get(id: string): Promise<Macro | null> {
    return this.store.get(id);
  }

  /**
   * Create an empty macro
   */
  async create(name?: string): Promise<Macro> {
    const macro = createMacro({ name });
    await this.store.save(macro);
    await this.controller.refreshMacros();
    this.log('info', `Created macro ${macro.name}`);
    return macro;
  }

  /**
   * Rename a macro. Empty names are discarded and the stored macro is
   * returned unchanged. Returns null when no macro has that id.
   */
  async rename(id: string, name: string): Promise<Macro | null> {
    const macro = await this.store.get(id);
    if (!macro) {
      return null;
    }
    const result = renameMacro(macro, name);
    if (result.changed) {
      await this.store.save(result.macro);
      await this.controller.refreshMacros();
    }
    return result.macro;
  }

  async remove(id: string): Promise<boolean> {
    const removed = await this.store.remove(id);
    if (removed) {
      await this.controller.refreshMacros();
      this.log('info', `Deleted macro ${id}`);
    }
    return removed;
  }

  // ===== Recording =====

  /**
   * Re-record an existing macro. Once the session has started its sequence
   * is cleared and then mirrored into the store event by event while
   * recording runs. Returns null when the macro does not exist or a
   * recording is already running; the stored macro is then left unchanged.
   */
  async recordInto(id: string, options: RecordOptions = {}): Promise<RecordingRun | null> {
    if (this.controller.isRecording()) {
      return null;
    }
    const existing = await this.store.get(id);
    if (!existing) {
      return null;
    }

    let live: Macro = { ...existing, keySequence: [], steps: [] };
    let writes: Promise<void> = Promise.resolve();
    const persist = (macro: Macro): void => {
      writes = writes
        .then(() => this.store.save(macro))
        .catch(error => {
          this.log('error', `Could not save recorded event: ${errorMessage(error)}`);
        });
    };
    const onEvent = (event: InputEvent): void => {
      live = { ...live, keySequence: [...live.keySequence, event] };
      persist(live);
    };

    if (!this.controller.startRecording({ name: existing.name, onEvent })) {
      return null;
    }

    const run = this.beginRun(id, options, async result => {
      await writes;
      // The stored sequence ends up equal to the trimmed buffer
      const keySequence = result.macro ? result.macro.keySequence : [];
      const final: Macro = { ...live, keySequence, steps: projectSteps(keySequence) };
      await this.store.save(final);
      return final;
    });

    persist(live);
    await writes;
    return run;
  }

  /**
   * Record a new macro. Nothing is stored when the recording is empty.
   */
  recordNew(name?: string, options: RecordOptions = {}): RecordingRun | null {
    if (!this.controller.startRecording({ name })) {
      return null;
    }
    return this.beginRun(null, options, async result => {
      if (!result.macro) {
        return null;
      }
      const macro: Macro = { ...result.macro, steps: projectSteps(result.macro.keySequence) };
      await this.store.save(macro);
      return macro;
    });
  }

  /**
   * Stop the recording started through this library, if any
   */
  async stopRecording(): Promise<Macro | null> {
    if (!this.activeRun) {
      return null;
    }
    return this.activeRun.stop();
  }

  getActiveRun(): RecordingRun | null {
    return this.activeRun;
  }

  private beginRun(
    targetId: string | null,
    options: RecordOptions,
    finalize: (result: RecordingStopResult) => Promise<Macro | null>
  ): RecordingRun {
    const autoStopMs = options.autoStopMs ?? this.settings.recordingAutoStopMs;
    let settle: (macro: Macro | null) => void = () => {};
    const finished = new Promise<Macro | null>(resolve => {
      settle = resolve;
    });
    let stopping: Promise<Macro | null> | null = null;

    const finish = async (): Promise<Macro | null> => {
      clearTimeout(timer);
      const result = this.controller.stopRecording();
      let macro: Macro | null = null;
      try {
        macro = await finalize(result);
        await this.controller.refreshMacros();
      } catch (error) {
        this.log('error', `Could not save recording: ${errorMessage(error)}`);
      }
      if (this.activeRun === run) {
        this.activeRun = null;
      }
      settle(macro);
      return macro;
    };

    const run: RecordingRun = {
      targetId,
      finished,
      stop: () => {
        if (!stopping) {
          stopping = finish();
        }
        return stopping;
      },
    };

    const timer = setTimeout(() => {
      this.log('info', `Recording auto-stopped after ${autoStopMs}ms`);
      void run.stop();
    }, autoStopMs);

    this.activeRun = run;
    return run;
  }

  // ===== Binding and execution =====

  /**
   * Capture the next down event as a macro's binding. Capture is cancelled
   * after the binding timeout. Returns null when the macro does not exist.
   */
  async bindInto(id: string, options: BindOptions = {}): Promise<BindingResult | null> {
    const macro = await this.store.get(id);
    if (!macro) {
      return null;
    }
    const timeoutMs = options.timeoutMs ?? this.settings.bindingTimeoutMs;
    const pending = this.controller.awaitBinding(id);
    const timer = setTimeout(() => this.controller.cancelBinding(), timeoutMs);
    try {
      return await pending;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Execute a stored macro. Returns null when the macro does not exist.
   */
  async execute(id: string, force = false): Promise<ExecuteResult | null> {
    const macro = await this.store.get(id);
    if (!macro) {
      return null;
    }
    return this.controller.executeMacro(macro, { force });
  }
}
