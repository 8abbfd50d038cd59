/**
 * Periodic tasks with explicit cancellation handles
 */

import { errorMessage } from './errors';
import { LogCallback, silentLog } from './logging';

/**
 * Handle returned for a scheduled task
 */
export interface TaskHandle {
  readonly name: string;
  cancel(): void;
  isActive(): boolean;
}

/**
 * Runs a task on a fixed interval. A run that is still in flight when the
 * next tick arrives causes that tick to be skipped.
 */
export class PeriodicTask implements TaskHandle {
  readonly name: string;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;
  private task: () => Promise<void> | void;
  private log: LogCallback;

  constructor(name: string, task: () => Promise<void> | void, onLog: LogCallback = silentLog) {
    this.name = name;
    this.task = task;
    this.log = onLog;
  }

  start(intervalMs: number): this {
    if (this.timer) {
      return this;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, intervalMs);
    return this;
  }

  cancel(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isActive(): boolean {
    return this.timer !== null;
  }

  /**
   * Run the task once now (skipped if a run is in flight)
   */
  async tick(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    try {
      await this.task();
    } catch (error) {
      this.log('error', `Periodic task "${this.name}" failed: ${errorMessage(error)}`);
    } finally {
      this.running = false;
    }
  }
}

/**
 * Owns a set of periodic tasks tied to one lifetime
 */
export class TaskScheduler {
  private tasks: PeriodicTask[] = [];
  private log: LogCallback;

  constructor(onLog: LogCallback = silentLog) {
    this.log = onLog;
  }

  every(name: string, intervalMs: number, task: () => Promise<void> | void): TaskHandle {
    const periodic = new PeriodicTask(name, task, this.log).start(intervalMs);
    this.tasks.push(periodic);
    return periodic;
  }

  /**
   * Cancel every task
   */
  cancelAll(): void {
    for (const task of this.tasks) {
      task.cancel();
    }
    this.tasks = [];
  }

  activeCount(): number {
    return this.tasks.filter(task => task.isActive()).length;
  }
}
