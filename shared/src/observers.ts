/**
 * Observer Registry
 *
 * Typed publish/subscribe owned by the composition root and handed to
 * consumers. A throwing listener is logged and does not stop the others.
 */

import { errorMessage } from './errors';
import { LogCallback, silentLog } from './logging';

export type Listener<P> = (payload: P) => void;

export class ObserverRegistry<Events extends object> {
  private listeners: { [K in keyof Events]?: Set<Listener<Events[K]>> } = {};
  private log: LogCallback;

  constructor(onLog: LogCallback = silentLog) {
    this.log = onLog;
  }

  /**
   * Register a listener. Returns the function that unregisters it.
   */
  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    const set: Set<Listener<Events[K]>> = this.listeners[event] ?? new Set();
    this.listeners[event] = set;
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const set = this.listeners[event];
    if (!set) return;
    for (const listener of [...set]) {
      try {
        listener(payload);
      } catch (error) {
        this.log('error', `Listener for "${String(event)}" failed: ${errorMessage(error)}`);
      }
    }
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.listeners[event]?.size ?? 0;
  }

  clear(): void {
    this.listeners = {};
  }
}
