/**
 * keyreel Error Codes and Error Classes
 *
 * Every failure path in the core maps to one of these codes. Per-event and
 * per-action failures are recovered inside the replay tiers; only the
 * total failure of every tier reaches a caller as a failed outcome.
 */

// ===== Error Codes =====

/**
 * Error codes for capture, replay and storage failures
 */
export const REPLAY_ERROR_CODES = {
  OK: 0,
  // Delivery errors (-3xx)
  SYNTHESIS_FAILED: -310,
  AUTOMATION_FAILED: -320,
  UNSUPPORTED_INPUT: -330,
  UNAUTHORIZED: -340,
  REENTRANT: -350,
  ALL_TIERS_FAILED: -390,
  // Data errors (-4xx)
  INVALID_DATA: -400,
  STORE_ERROR: -410,
} as const;

export type ReplayErrorCode = typeof REPLAY_ERROR_CODES[keyof typeof REPLAY_ERROR_CODES];

// ===== Error Classes =====

/**
 * Base class for all keyreel errors
 */
export class KeyreelError extends Error {
  readonly code: ReplayErrorCode;

  constructor(message: string, code: ReplayErrorCode) {
    super(message);
    this.name = 'KeyreelError';
    this.code = code;
  }
}

/**
 * The platform refused to construct or post a synthetic event
 */
export class SynthesisError extends KeyreelError {
  constructor(message: string) {
    super(message, REPLAY_ERROR_CODES.SYNTHESIS_FAILED);
    this.name = 'SynthesisError';
  }
}

/**
 * A button or key code has no known synthesis mapping
 */
export class UnsupportedInputError extends KeyreelError {
  constructor(message: string) {
    super(message, REPLAY_ERROR_CODES.UNSUPPORTED_INPUT);
    this.name = 'UnsupportedInputError';
  }
}

/**
 * A scripted automation action failed
 */
export class AutomationError extends KeyreelError {
  constructor(message: string) {
    super(message, REPLAY_ERROR_CODES.AUTOMATION_FAILED);
    this.name = 'AutomationError';
  }
}

/**
 * A stored record could not be decoded
 */
export class MacroDataError extends KeyreelError {
  constructor(message: string) {
    super(message, REPLAY_ERROR_CODES.INVALID_DATA);
    this.name = 'MacroDataError';
  }
}

/**
 * The macro store could not be read or written
 */
export class MacroStoreError extends KeyreelError {
  constructor(message: string) {
    super(message, REPLAY_ERROR_CODES.STORE_ERROR);
    this.name = 'MacroStoreError';
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Resolve the error code carried by a thrown value
 */
export function errorCodeOf(error: unknown, fallback: ReplayErrorCode): ReplayErrorCode {
  return error instanceof KeyreelError ? error.code : fallback;
}
