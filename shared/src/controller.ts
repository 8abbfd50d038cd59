/**
 * Macro Controller
 *
 * Composition root for capture and replay. Owns the recording session, the
 * macro cache, the re-entrancy flag, binding capture and the background
 * tasks, and routes every live event through one serial queue:
 *
 *   capture -> queue -> normalize -> { recording | binding | trigger }
 *
 * Replay runs outside the queue drain, so live capture keeps flowing while a
 * macro plays. Triggers are suppressed for as long as `isReplaying` is set.
 */

import { REPLAY_ERROR_CODES, ReplayErrorCode, errorMessage } from './errors';
import { SerialEventQueue } from './event-queue';
import { InputEvent } from './input-event';
import { AuthorizationProvider, CaptureSource, MacroStore } from './interfaces';
import { LogCallback, filterDebug, silentLog } from './logging';
import { Macro, resolveMacroName } from './macro';
import { ModifierFlags, ModifierFlagsTracker, RawInputEvent, normalize } from './normalizer';
import { ObserverRegistry } from './observers';
import {
  RecordedEventCallback,
  RecordingStartOptions,
  RecordingStopResult,
  RecordingSession,
} from './recording-session';
import { ReplayEngine, ReplayOutcome } from './replay/engine';
import { TaskScheduler } from './scheduler';
import { DEFAULT_SETTINGS, Settings } from './settings';
import { matchTrigger } from './trigger-matcher';

export const UNAUTHORIZED_MESSAGE = 'Input control is not authorized. Grant accessibility access to replay macros.';

// ===== Events =====

/**
 * Events published through the controller's observer registry
 */
export interface MacroControllerEvents {
  'recording-started': { name: string };
  'event-recorded': { event: InputEvent };
  'recording-stopped': RecordingStopResult;
  'binding-assigned': { macroId: string; binding: InputEvent };
  'binding-cleared': { macroId: string };
  'macro-triggered': { macro: Macro; event: InputEvent };
  'replay-finished': { macro: Macro; outcome: ReplayOutcome };
  'authorization-changed': { authorized: boolean };
  'macros-refreshed': { count: number };
  'error': { code: ReplayErrorCode; message: string; macroId?: string };
}

// ===== Results =====

export type ExecuteStatus = 'empty' | 'busy' | 'unauthorized' | 'completed' | 'failed';

/**
 * Result of executeMacro
 */
export interface ExecuteResult {
  status: ExecuteStatus;
  success: boolean;
  errorCode: ReplayErrorCode;
  errorMessage?: string;
  /** Present when the replay engine ran */
  outcome?: ReplayOutcome;
}

export interface ExecuteOptions {
  /** Skip the authorization check (trigger-initiated replays) */
  force?: boolean;
}

/**
 * How a binding capture ended
 */
export interface BindingResult {
  macroId: string;
  outcome: 'assigned' | 'cleared' | 'cancelled';
  binding: InputEvent | null;
}

/**
 * Snapshot of controller state for the host channel
 */
export interface ControllerStatus {
  started: boolean;
  isRecording: boolean;
  isReplaying: boolean;
  isAuthorized: boolean;
  awaitingBindingFor: string | null;
  recordedCount: number;
  macroCount: number;
  /** Labels of inputs currently held down */
  pressed: string[];
  lastPressed: string | null;
  errorMessage: string | null;
}

// ===== Controller =====

export interface MacroControllerOptions {
  engine: ReplayEngine;
  store: MacroStore;
  authorization: AuthorizationProvider;
  capture?: CaptureSource;
  observers?: ObserverRegistry<MacroControllerEvents>;
  settings?: Settings;
  onLog?: LogCallback;
}

type EventQueueItem =
  | { kind: 'input'; raw: RawInputEvent }
  | { kind: 'flags'; flags: ModifierFlags; timestamp?: number };

interface PendingBinding {
  macroId: string;
  resolve: (result: BindingResult) => void;
}

export class MacroController {
  readonly observers: ObserverRegistry<MacroControllerEvents>;

  private engine: ReplayEngine;
  private store: MacroStore;
  private authorization: AuthorizationProvider;
  private capture: CaptureSource | undefined;
  private settings: Settings;
  private log: LogCallback;

  private session = new RecordingSession();
  private flagsTracker = new ModifierFlagsTracker();
  private queue: SerialEventQueue<EventQueueItem>;
  private scheduler: TaskScheduler;

  private cache: Macro[] = [];
  /** Bumped whenever the cache is patched in place */
  private cacheRevision = 0;
  private pressed = new Map<string, InputEvent>();
  private lastPressed: InputEvent | null = null;
  private pendingBinding: PendingBinding | null = null;
  private inFlight = new Set<Promise<void>>();

  private replaying = false;
  private authorized = false;
  private started = false;
  private errorMessage: string | null = null;

  constructor(options: MacroControllerOptions) {
    this.engine = options.engine;
    this.store = options.store;
    this.authorization = options.authorization;
    this.capture = options.capture;
    this.settings = options.settings ?? { ...DEFAULT_SETTINGS };
    this.log = filterDebug(options.onLog ?? silentLog, () => this.settings.debug);
    this.observers = options.observers ?? new ObserverRegistry<MacroControllerEvents>(this.log);
    this.queue = new SerialEventQueue<EventQueueItem>(item => this.consume(item), this.log);
    this.scheduler = new TaskScheduler(this.log);
  }

  // ===== Lifecycle =====

  /**
   * Load the cache, check authorization, subscribe to capture and schedule
   * the periodic authorization and cache refresh tasks.
   */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;

    await this.refreshMacros();
    await this.checkAuthorization();

    if (this.capture) {
      try {
        this.capture.start(raw => this.submit(raw));
      } catch (error) {
        // Local submissions through submit() keep working without the hook
        this.log('error', `Global capture unavailable: ${errorMessage(error)}`);
        this.observers.emit('error', {
          code: REPLAY_ERROR_CODES.UNAUTHORIZED,
          message: `Global capture unavailable: ${errorMessage(error)}`,
        });
      }
    }

    this.scheduler.every('authorization', this.settings.authorizationCheckIntervalMs, async () => {
      await this.checkAuthorization();
    });
    this.scheduler.every('macro-cache', this.settings.cacheRefreshIntervalMs, async () => {
      await this.refreshMacros();
    });
    this.log('info', 'Macro controller started');
  }

  /**
   * Cancel background tasks, detach capture and end any recording or
   * binding capture in progress
   */
  dispose(): void {
    this.scheduler.cancelAll();
    if (this.started && this.capture) {
      this.capture.stop();
    }
    this.cancelBinding();
    this.session.stop();
    this.started = false;
    this.log('info', 'Macro controller stopped');
  }

  /**
   * Wait for asynchronous work started from the queue (trigger replays and
   * binding writes) to finish
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  // ===== Live dispatch =====

  /**
   * Deliver one raw event. Safe to call from any capture callback.
   */
  submit(raw: RawInputEvent): void {
    this.queue.push({ kind: 'input', raw });
  }

  /**
   * Deliver a modifier flags word; each changed modifier becomes one event
   */
  submitFlags(flags: ModifierFlags, timestamp?: number): void {
    this.queue.push({ kind: 'flags', flags, timestamp });
  }

  private consume(item: EventQueueItem): void {
    if (item.kind === 'flags') {
      for (const raw of this.flagsTracker.update(item.flags, item.timestamp)) {
        this.dispatch(normalize(raw));
      }
      return;
    }
    this.dispatch(normalize(item.raw));
  }

  private dispatch(event: InputEvent): void {
    const key = `${event.channel}:${event.code}`;
    if (event.phase) {
      this.pressed.set(key, event);
      this.lastPressed = event;
    } else {
      this.pressed.delete(key);
    }

    if (this.session.isRecording()) {
      this.session.append(event);
      return;
    }

    if (this.pendingBinding && event.phase) {
      const pending = this.pendingBinding;
      this.pendingBinding = null;
      this.track(this.applyBinding(pending, event));
      return;
    }

    if (!event.phase || this.replaying) {
      return;
    }

    const hit = matchTrigger(event, this.cache);
    if (hit) {
      this.log('debug', `Trigger ${event.label} matched macro ${hit.name}`);
      this.observers.emit('macro-triggered', { macro: hit, event });
      this.track(this.executeMacro(hit, { force: true }).then(() => undefined));
    }
  }

  private track(work: Promise<void>): void {
    const tracked = work.finally(() => {
      this.inFlight.delete(tracked);
    });
    this.inFlight.add(tracked);
  }

  // ===== Replay =====

  /**
   * Replay a macro. Never throws; the re-entrancy flag is always released.
   */
  async executeMacro(macro: Macro, options: ExecuteOptions = {}): Promise<ExecuteResult> {
    if (macro.keySequence.length === 0) {
      this.log('info', `Macro ${macro.name} has no keys recorded`);
      return { status: 'empty', success: true, errorCode: REPLAY_ERROR_CODES.OK };
    }
    if (this.replaying) {
      this.log('debug', `Ignoring ${macro.name}: a replay is already running`);
      return {
        status: 'busy',
        success: false,
        errorCode: REPLAY_ERROR_CODES.REENTRANT,
        errorMessage: 'A macro is already running',
      };
    }

    this.replaying = true;
    try {
      if (!options.force) {
        const authorized = await this.checkAuthorization();
        if (!authorized) {
          this.errorMessage = UNAUTHORIZED_MESSAGE;
          this.observers.emit('error', {
            code: REPLAY_ERROR_CODES.UNAUTHORIZED,
            message: UNAUTHORIZED_MESSAGE,
            macroId: macro.id,
          });
          return {
            status: 'unauthorized',
            success: false,
            errorCode: REPLAY_ERROR_CODES.UNAUTHORIZED,
            errorMessage: UNAUTHORIZED_MESSAGE,
          };
        }
      }

      this.errorMessage = null;
      const outcome = await this.engine.replay(macro);
      this.observers.emit('replay-finished', { macro, outcome });

      if (!outcome.success) {
        this.errorMessage = outcome.errorMessage ?? 'Macro replay failed';
        this.observers.emit('error', {
          code: outcome.errorCode,
          message: this.errorMessage,
          macroId: macro.id,
        });
        return {
          status: 'failed',
          success: false,
          errorCode: outcome.errorCode,
          errorMessage: this.errorMessage,
          outcome,
        };
      }
      return { status: 'completed', success: true, errorCode: REPLAY_ERROR_CODES.OK, outcome };
    } catch (error) {
      this.errorMessage = errorMessage(error);
      this.log('error', `Macro ${macro.name} failed: ${this.errorMessage}`);
      this.observers.emit('error', {
        code: REPLAY_ERROR_CODES.ALL_TIERS_FAILED,
        message: this.errorMessage,
        macroId: macro.id,
      });
      return {
        status: 'failed',
        success: false,
        errorCode: REPLAY_ERROR_CODES.ALL_TIERS_FAILED,
        errorMessage: this.errorMessage,
      };
    } finally {
      this.replaying = false;
    }
  }

  isReplaying(): boolean {
    return this.replaying;
  }

  // ===== Recording =====

  /**
   * Start recording. Returns false if a recording is already running.
   */
  startRecording(options: RecordingStartOptions = {}): boolean {
    const forward: RecordedEventCallback | undefined = options.onEvent;
    const started = this.session.start({
      name: options.name,
      onEvent: event => {
        this.observers.emit('event-recorded', { event });
        forward?.(event);
      },
    });
    if (!started) {
      this.log('debug', 'Recording already in progress');
      return false;
    }
    this.log('info', 'Recording started');
    this.observers.emit('recording-started', { name: resolveMacroName(options.name) });
    return true;
  }

  /**
   * Stop recording. Idempotent: returns a null macro when not recording.
   */
  stopRecording(): RecordingStopResult {
    if (!this.session.isRecording()) {
      return { macro: null, trimmedClick: false };
    }
    const result = this.session.stop();
    this.log('info', result.macro
      ? `Recording stopped with ${result.macro.keySequence.length} events`
      : 'Recording stopped with no events');
    this.observers.emit('recording-stopped', result);
    return result;
  }

  isRecording(): boolean {
    return this.session.isRecording();
  }

  // ===== Binding =====

  /**
   * Make the next down event the binding of a macro. The clear key removes
   * the binding instead. A previous binding capture is cancelled.
   */
  awaitBinding(macroId: string): Promise<BindingResult> {
    this.cancelBinding();
    return new Promise<BindingResult>(resolve => {
      this.pendingBinding = { macroId, resolve };
      this.log('debug', `Awaiting binding for macro ${macroId}`);
    });
  }

  /**
   * Leave binding capture without consuming an event
   */
  cancelBinding(): void {
    const pending = this.pendingBinding;
    if (!pending) {
      return;
    }
    this.pendingBinding = null;
    pending.resolve({ macroId: pending.macroId, outcome: 'cancelled', binding: null });
  }

  private async applyBinding(pending: PendingBinding, event: InputEvent): Promise<void> {
    const clearing = event.channel === 'keyboard' && event.code === this.settings.clearBindingKeyCode;
    const binding = clearing ? null : event;

    try {
      const macro = this.cache.find(candidate => candidate.id === pending.macroId)
        ?? await this.store.get(pending.macroId);
      if (!macro) {
        throw new Error(`Macro ${pending.macroId} not found`);
      }
      const updated: Macro = { ...macro, binding };
      await this.store.save(updated);
      this.cacheRevision++;
      this.cache = this.cache.map(candidate => (candidate.id === updated.id ? updated : candidate));
    } catch (error) {
      this.log('error', `Could not save binding: ${errorMessage(error)}`);
      this.observers.emit('error', {
        code: REPLAY_ERROR_CODES.STORE_ERROR,
        message: `Could not save binding: ${errorMessage(error)}`,
        macroId: pending.macroId,
      });
      pending.resolve({ macroId: pending.macroId, outcome: 'cancelled', binding: null });
      return;
    }

    if (binding) {
      this.log('info', `Bound ${binding.label} to macro ${pending.macroId}`);
      this.observers.emit('binding-assigned', { macroId: pending.macroId, binding });
      pending.resolve({ macroId: pending.macroId, outcome: 'assigned', binding });
    } else {
      this.log('info', `Cleared binding of macro ${pending.macroId}`);
      this.observers.emit('binding-cleared', { macroId: pending.macroId });
      pending.resolve({ macroId: pending.macroId, outcome: 'cleared', binding: null });
    }
  }

  // ===== Cache and authorization =====

  /**
   * Reload the macro cache. The array is swapped whole; on a store failure
   * the previous cache is kept.
   */
  async refreshMacros(): Promise<readonly Macro[]> {
    const revision = this.cacheRevision;
    try {
      const macros = await this.store.fetchAll();
      if (revision !== this.cacheRevision) {
        // The cache was patched while this fetch ran; its snapshot is older
        this.log('debug', 'Discarded a macro refresh that predates a binding change');
        return this.cache;
      }
      this.cache = macros;
      this.observers.emit('macros-refreshed', { count: macros.length });
    } catch (error) {
      this.log('error', `Macro cache refresh failed: ${errorMessage(error)}`);
    }
    return this.cache;
  }

  getMacros(): readonly Macro[] {
    return this.cache;
  }

  async checkAuthorization(): Promise<boolean> {
    let authorized: boolean;
    try {
      authorized = await this.authorization.isAuthorized();
    } catch (error) {
      this.log('warn', `Authorization check failed: ${errorMessage(error)}`);
      authorized = false;
    }
    if (authorized !== this.authorized) {
      this.authorized = authorized;
      this.log('info', `Input control ${authorized ? 'authorized' : 'not authorized'}`);
      this.observers.emit('authorization-changed', { authorized });
    }
    if (authorized && this.errorMessage === UNAUTHORIZED_MESSAGE) {
      this.errorMessage = null;
    }
    return authorized;
  }

  async requestAuthorization(): Promise<boolean> {
    await this.authorization.requestAuthorization();
    return this.checkAuthorization();
  }

  // ===== Status =====

  getStatus(): ControllerStatus {
    return {
      started: this.started,
      isRecording: this.session.isRecording(),
      isReplaying: this.replaying,
      isAuthorized: this.authorized,
      awaitingBindingFor: this.pendingBinding?.macroId ?? null,
      recordedCount: this.session.getBuffer().length,
      macroCount: this.cache.length,
      pressed: [...this.pressed.values()].map(event => event.label),
      lastPressed: this.lastPressed?.label ?? null,
      errorMessage: this.errorMessage,
    };
  }
}
