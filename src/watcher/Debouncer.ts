import type { ChangeEvent, RestartSignal } from './types.js';
import { systemScheduler, type Scheduler } from '../utils/scheduler.js';

export interface DebouncerOptions {
  windowMs: number;
  onSignal: (signal: RestartSignal) => void;
  scheduler?: Scheduler;
}

/**
 * Coalesces bursts of relevant change events into one RestartSignal.
 * Every event restarts the quiet-period timer; the signal fires once the
 * window passes with no further events.
 */
export class Debouncer {
  private pendingPaths = new Set<string>();
  private cancelTimer: (() => void) | null = null;
  private readonly scheduler: Scheduler;

  constructor(private options: DebouncerOptions) {
    this.scheduler = options.scheduler ?? systemScheduler;
  }

  push(event: ChangeEvent): void {
    this.pendingPaths.add(event.path);
    this.scheduleFire();
  }

  private scheduleFire(): void {
    this.cancelTimer?.();

    this.cancelTimer = this.scheduler.schedule(() => {
      this.cancelTimer = null;
      this.fire();
    }, this.options.windowMs);
  }

  private fire(): void {
    if (this.pendingPaths.size === 0) {
      return;
    }

    const paths = Array.from(this.pendingPaths);
    this.pendingPaths.clear();
    this.options.onSignal({ at: this.scheduler.now(), paths });
  }

  /**
   * Drop the open burst without signalling (used at shutdown)
   */
  cancel(): void {
    this.cancelTimer?.();
    this.cancelTimer = null;
    this.pendingPaths.clear();
  }

  hasPending(): boolean {
    return this.pendingPaths.size > 0;
  }
}
