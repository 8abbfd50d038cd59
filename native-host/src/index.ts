/**
 * Native host entry point
 *
 * Wires the core engine to the OS adapters and serves the host message
 * channel on stdin/stdout.
 */
import {
  ControllerStatus,
  MacroController,
  MacroControllerEvents,
  MacroLibrary,
  Macro,
  MacroRecord,
  RequestMessage,
  ResponseMessage,
  ResponseMessageType,
  createMessageId,
  createReplayEngine,
  createTimestamp,
  describeSteps,
  encodeInputEvent,
  encodeMacro,
  errorMessage,
  formatBinding,
  formatKeySequence,
} from '../../shared/src/index';
import { loadSettings, resolveStorePath } from './config';
import { configureLogging, createLogCallback } from './logger';
import { HostConnection, initHostChannel } from './messaging';
import { createAuthorizationProvider } from './services/authorization';
import { UiohookCaptureSource } from './services/capture-service';
import { JsonFileMacroStore } from './services/macro-store';
import { createScriptRunner } from './services/scripting-service';
import { NutBestEffortSink, NutSyntheticInputSink, disableAutoDelay } from './services/synthetic-input';

// Export messaging module for external use
export * from './messaging';

/**
 * Services a message handler works against
 */
export interface HostContext {
  controller: MacroController;
  library: MacroLibrary;
}

/**
 * Macro as sent over the channel, with its display strings
 */
export interface WireMacro extends MacroRecord {
  display: {
    binding: string;
    keys: string;
    steps: string;
  };
}

export function toWireMacro(macro: Macro): WireMacro {
  return {
    ...encodeMacro(macro),
    display: {
      binding: formatBinding(macro.binding),
      keys: formatKeySequence(macro.keySequence),
      steps: describeSteps(macro.steps),
    },
  };
}

// ===== Payload helpers =====

function payloadField(message: RequestMessage, key: string): unknown {
  const payload = message.payload;
  if (typeof payload !== 'object' || payload === null) {
    return undefined;
  }
  return new Map<string, unknown>(Object.entries(payload)).get(key);
}

function optionalString(message: RequestMessage, key: string): string | undefined {
  const value = payloadField(message, key);
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(message: RequestMessage, key: string): number | undefined {
  const value = payloadField(message, key);
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function reply(message: RequestMessage, type: ResponseMessageType, payload?: unknown): ResponseMessage {
  return { type, id: message.id, timestamp: createTimestamp(), payload };
}

function fail(message: RequestMessage, error: string): ResponseMessage {
  return { type: 'error', id: message.id, timestamp: createTimestamp(), error };
}

/**
 * Handle one request from the presentation layer
 */
export async function handleMessage(message: RequestMessage, context: HostContext): Promise<ResponseMessage> {
  const { controller, library } = context;

  try {
    switch (message.type) {
      case 'ping':
        return reply(message, 'pong');

      case 'get_status':
        return reply(message, 'result', controller.getStatus());

      case 'get_macros': {
        const macros = await library.list();
        return reply(message, 'result', { macros: macros.map(toWireMacro) });
      }

      case 'create_macro': {
        const macro = await library.create(optionalString(message, 'name'));
        return reply(message, 'result', { macro: toWireMacro(macro) });
      }

      case 'rename_macro': {
        const id = optionalString(message, 'id');
        const name = optionalString(message, 'name');
        if (!id || name === undefined) {
          return fail(message, 'rename_macro needs id and name');
        }
        const macro = await library.rename(id, name);
        return macro ? reply(message, 'result', { macro: toWireMacro(macro) }) : fail(message, `Macro ${id} not found`);
      }

      case 'delete_macro': {
        const id = optionalString(message, 'id');
        if (!id) {
          return fail(message, 'delete_macro needs id');
        }
        return reply(message, 'result', { removed: await library.remove(id) });
      }

      case 'record_start': {
        if (controller.isRecording()) {
          return fail(message, 'Recording already in progress');
        }
        const id = optionalString(message, 'id');
        const autoStopMs = optionalNumber(message, 'autoStopMs');
        const run = id
          ? await library.recordInto(id, { autoStopMs })
          : library.recordNew(optionalString(message, 'name'), { autoStopMs });
        if (!run) {
          return fail(message, id ? `Macro ${id} not found` : 'Recording could not be started');
        }
        return reply(message, 'result', { recording: true, targetId: run.targetId });
      }

      case 'record_stop': {
        if (library.getActiveRun()) {
          const macro = await library.stopRecording();
          return reply(message, 'result', { macro: macro ? toWireMacro(macro) : null });
        }
        const result = controller.stopRecording();
        return reply(message, 'result', { macro: result.macro ? toWireMacro(result.macro) : null });
      }

      case 'bind_start': {
        const id = optionalString(message, 'id');
        if (!id) {
          return fail(message, 'bind_start needs id');
        }
        const result = await library.bindInto(id, { timeoutMs: optionalNumber(message, 'timeoutMs') });
        if (!result) {
          return fail(message, `Macro ${id} not found`);
        }
        return reply(message, 'result', {
          outcome: result.outcome,
          binding: result.binding ? encodeInputEvent(result.binding) : null,
          display: formatBinding(result.binding),
        });
      }

      case 'bind_cancel':
        controller.cancelBinding();
        return reply(message, 'result', { cancelled: true });

      case 'execute_macro': {
        const id = optionalString(message, 'id');
        if (!id) {
          return fail(message, 'execute_macro needs id');
        }
        const result = await library.execute(id, payloadField(message, 'force') === true);
        return result ? reply(message, 'result', result) : fail(message, `Macro ${id} not found`);
      }

      case 'request_authorization':
        return reply(message, 'result', { authorized: await controller.requestAuthorization() });

      default:
        return fail(message, 'Unknown message type');
    }
  } catch (error) {
    return fail(message, errorMessage(error));
  }
}

// ===== Notifications =====

function notification(type: ResponseMessageType, payload: unknown): ResponseMessage {
  return { type, id: createMessageId(), timestamp: createTimestamp(), payload };
}

function statusPayload(event: keyof MacroControllerEvents, status: ControllerStatus): unknown {
  return { event, status };
}

/**
 * Forward controller events to the channel as notifications. Returns the
 * function that stops forwarding.
 */
export function forwardNotifications(controller: MacroController, send: (message: ResponseMessage) => void): () => void {
  const { observers } = controller;
  const status = (event: keyof MacroControllerEvents) => () => {
    send(notification('STATUS_UPDATE', statusPayload(event, controller.getStatus())));
  };

  const unsubscribers = [
    observers.on('recording-started', status('recording-started')),
    observers.on('recording-stopped', status('recording-stopped')),
    observers.on('binding-assigned', status('binding-assigned')),
    observers.on('binding-cleared', status('binding-cleared')),
    observers.on('authorization-changed', status('authorization-changed')),
    observers.on('event-recorded', ({ event }) => {
      send(notification('RECORDING_EVENT', { event: encodeInputEvent(event) }));
    }),
    observers.on('macro-triggered', ({ macro, event }) => {
      send(notification('MACRO_TRIGGERED', { id: macro.id, name: macro.name, trigger: formatBinding(event) }));
    }),
    observers.on('replay-finished', ({ macro, outcome }) => {
      send(notification('MACRO_COMPLETE', {
        id: macro.id,
        success: outcome.success,
        tier: outcome.tier,
        errorCode: outcome.errorCode,
        executionTimeMs: outcome.executionTimeMs,
      }));
    }),
    observers.on('error', ({ code, message, macroId }) => {
      send(notification('MACRO_ERROR', { code, message, macroId: macroId ?? null }));
    }),
  ];

  return () => {
    for (const unsubscribe of unsubscribers) {
      unsubscribe();
    }
  };
}

// ===== Startup =====

/**
 * A running native host
 */
export interface NativeHost extends HostContext {
  connection: HostConnection;
  shutdown(): void;
}

/**
 * Start the native host
 *
 * Loads settings, configures logging, builds the replay tiers and the
 * controller, and begins serving the message channel.
 */
export async function startNativeHost(): Promise<NativeHost> {
  const hostLog = createLogCallback('host');
  const settings = await loadSettings({ onLog: hostLog });
  configureLogging(settings);
  disableAutoDelay();

  const store = new JsonFileMacroStore(resolveStorePath(settings), createLogCallback('store'));
  const engine = createReplayEngine(
    {
      direct: new NutSyntheticInputSink(),
      scripted: createScriptRunner(),
      bestEffort: new NutBestEffortSink(),
    },
    settings,
    createLogCallback('replay')
  );
  const controller = new MacroController({
    engine,
    store,
    authorization: createAuthorizationProvider(),
    capture: new UiohookCaptureSource(createLogCallback('capture')),
    settings,
    onLog: createLogCallback('controller'),
  });
  const library = new MacroLibrary(controller, store, { settings, onLog: createLogCallback('library') });

  let stopForwarding: () => void = () => {};
  const shutdown = (): void => {
    stopForwarding();
    controller.dispose();
  };

  const connection = initHostChannel(message => handleMessage(message, { controller, library }), {
    onClose: () => {
      hostLog('info', 'Channel closed, shutting down');
      shutdown();
      process.exit(0);
    },
  });
  stopForwarding = forwardNotifications(controller, connection.send);

  await controller.start();
  hostLog('info', `Native host ready (tiers: ${engine.getTiers().join(', ')})`);

  return { controller, library, connection, shutdown };
}

// Auto-start when running as the main module
if (require.main === module) {
  startNativeHost().catch(error => {
    process.stderr.write(`keyreel host failed to start: ${errorMessage(error)}\n`);
    process.exit(1);
  });
}
