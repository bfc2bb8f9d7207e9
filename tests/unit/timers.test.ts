import { beforeEach, afterEach, describe, it, expect, vi } from 'vitest';
import { setLongTimeout } from '../../src/utils/timers';
import { MAX_TIMER_DELAY_MS } from '../../src/utils/constants';

describe('setLongTimeout', () => {
  const NOW = Date.parse('2023-01-08T00:00:00Z');

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.clearAllTimers();
    vi.useRealTimers();
  });

  it('runs a short delay like setTimeout', () => {
    const callback = vi.fn();
    const timeout = setLongTimeout(callback, 10_000);

    expect(timeout.dueAt).toBe(NOW + 10_000);
    vi.advanceTimersByTime(9_999);
    expect(callback).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('splits a delay beyond the timer limit, keeping one timer pending', () => {
    const callback = vi.fn();
    const delay = 2 * MAX_TIMER_DELAY_MS + 5;
    setLongTimeout(callback, delay);

    vi.advanceTimersByTime(MAX_TIMER_DELAY_MS);
    expect(callback).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(1);

    vi.advanceTimersByTime(MAX_TIMER_DELAY_MS + 4);
    expect(callback).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('never runs once cancelled, even between segments', () => {
    const callback = vi.fn();
    const timeout = setLongTimeout(callback, 3 * MAX_TIMER_DELAY_MS);

    vi.advanceTimersByTime(MAX_TIMER_DELAY_MS + 1);
    timeout.cancel();
    vi.advanceTimersByTime(3 * MAX_TIMER_DELAY_MS);

    expect(callback).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(0);
  });
});
