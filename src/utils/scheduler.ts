/**
 * Timer source shared by the debouncer and the restart controller; tests
 * substitute a manual clock.
 */
export interface Scheduler {
  /** Run `callback` after `ms`; the returned function cancels it */
  schedule(callback: () => void, ms: number): () => void;
  now(): number;
}

export const systemScheduler: Scheduler = {
  schedule(callback, ms) {
    const timer = setTimeout(callback, ms);
    return () => clearTimeout(timer);
  },
  now: () => Date.now(),
};
