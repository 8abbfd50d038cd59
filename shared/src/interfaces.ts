/**
 * Boundary contracts the core consumes. The native host supplies OS-backed
 * implementations; tests supply in-process fakes.
 */

import { Macro } from './macro';
import { RawInputEvent } from './normalizer';

/**
 * Receives raw events from a capture source, possibly at arbitrary times
 */
export type CaptureListener = (raw: RawInputEvent) => void;

/**
 * Platform input hook registration
 */
export interface CaptureSource {
  /** Begin delivering events. Throws when the hook cannot be installed. */
  start(listener: CaptureListener): void;
  stop(): void;
}

/**
 * Input-control authorization query
 */
export interface AuthorizationProvider {
  isAuthorized(): Promise<boolean>;
  /** May prompt the user; resolves once the request has been issued */
  requestAuthorization(): Promise<void>;
}

/**
 * CRUD over macro records
 */
export interface MacroStore {
  /** All macros, newest first */
  fetchAll(): Promise<Macro[]>;
  get(id: string): Promise<Macro | null>;
  /** Insert or replace by id */
  save(macro: Macro): Promise<void>;
  /** Returns false when no macro had that id */
  remove(id: string): Promise<boolean>;
}
