import { MAX_TIMER_DELAY_MS } from './constants';

export interface LongTimeout {
  /** Epoch milliseconds at which the callback runs. */
  readonly dueAt: number;
  cancel(): void;
}

/**
 * Like setTimeout, but for delays beyond {@link MAX_TIMER_DELAY_MS}: the wait
 * is split into consecutive timers, only one of which is pending at a time.
 */
export function setLongTimeout(callback: () => void, delayMs: number): LongTimeout {
  const dueAt = Date.now() + delayMs;
  let handle: ReturnType<typeof setTimeout> | undefined;

  const schedule = () => {
    const remaining = Math.max(0, dueAt - Date.now());
    handle = setTimeout(() => {
      if (Date.now() < dueAt) {
        schedule();
      } else {
        callback();
      }
    }, Math.min(remaining, MAX_TIMER_DELAY_MS));
  };
  schedule();

  return {
    dueAt,
    cancel: () => clearTimeout(handle),
  };
}
