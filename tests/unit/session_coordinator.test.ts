import { beforeEach, afterEach, describe, it, expect, vi } from 'vitest';
import { SessionCoordinator } from '../../src/time/session_coordinator';
import { QueryStringAddressBar } from '../../src/time/address_bar';
import { InvalidDashboardSettingsError, InvalidExpressionError, InvalidIntervalError } from '../../src/time/errors';
import { absolute, relative } from '../../src/time/types';
import type { Logger } from '../../src/utils/logger';
import { createMockLogger } from '../fixtures/mock_logger';

const T0 = Date.parse('2023-01-01T00:00:00Z');
const NOW = Date.parse('2023-01-08T00:00:00Z');

const liveDashboard = {
  uid: 'ops-overview',
  title: 'Ops overview',
  time: { from: 'now-6h', to: 'now' },
  refresh: '30s',
};

describe('SessionCoordinator', () => {
  let logger: Logger;
  let coordinator: SessionCoordinator;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    logger = createMockLogger();
    coordinator = new SessionCoordinator({ logger });
  });

  afterEach(() => {
    coordinator.dispose();
    vi.clearAllTimers();
    vi.useRealTimers();
  });

  describe('init', () => {
    it('resolves the saved range against the clock and arms auto-refresh', () => {
      const resolved = coordinator.init(liveDashboard);

      expect(resolved.from.toISOString()).toBe('2023-01-07T18:00:00.000Z');
      expect(resolved.to.toISOString()).toBe('2023-01-08T00:00:00.000Z');
      expect(coordinator.schedulerState).toBe('armed');
      expect(coordinator.nextRefreshAt).toBe(NOW + 30_000);
      expect(logger.info).toHaveBeenCalledWith(
        'Dashboard session started: 2023-01-07T18:00:00.000Z to 2023-01-08T00:00:00.000Z',
        { from: 'now-6h', to: 'now', refresh: '30s' }
      );
    });

    it('uses the default range when the dashboard has none', () => {
      const resolved = coordinator.init({ uid: 'fresh' });

      expect(resolved.from.toISOString()).toBe('2023-01-07T18:00:00.000Z');
      expect(coordinator.schedulerState).toBe('idle');
      expect(vi.getTimerCount()).toBe(0);
    });

    it('overlays address-bar parameters on the saved range', () => {
      coordinator.init(liveDashboard, { from: '20230101', to: null });

      expect(coordinator.getForAddressBar()).toEqual({ from: String(T0), to: 'now' });
    });

    it('keeps the saved "to" when the address bar carries a malformed one', () => {
      coordinator.init(liveDashboard, { to: 'not-a-date' });

      expect(coordinator.getForAddressBar()).toEqual({ from: 'now-6h', to: 'now' });
      expect(logger.warn).toHaveBeenCalledWith('Ignoring malformed "to" parameter', { value: 'not-a-date' });
    });

    it('falls back to the saved range when an address-bar expression cannot be resolved', () => {
      const resolved = coordinator.init(liveDashboard, { from: 'now-1fortnight', to: 'now' });

      expect(coordinator.isActive).toBe(true);
      expect(resolved.from.toISOString()).toBe('2023-01-07T18:00:00.000Z');
      expect(coordinator.getForAddressBar()).toEqual({ from: 'now-6h', to: 'now' });
      expect(logger.warn).toHaveBeenCalledWith('Ignoring malformed "from" parameter', { value: 'now-1fortnight' });
    });

    it('does not pause auto-refresh for a saved absolute range', () => {
      coordinator.init({ ...liveDashboard, time: { from: T0, to: NOW } });

      expect(coordinator.schedulerState).toBe('armed');
    });

    it('cancels everything the previous dashboard scheduled', () => {
      const onRefreshRequested = vi.fn();
      coordinator.subscribe({ onRefreshRequested });
      coordinator.init(liveDashboard);
      coordinator.setRange({ from: 'now-1h', to: 'now' });
      expect(vi.getTimerCount()).toBe(2);

      coordinator.init({ ...liveDashboard, uid: 'billing', refresh: '10s' });

      expect(vi.getTimerCount()).toBe(1);
      vi.advanceTimersByTime(9_999);
      expect(onRefreshRequested).not.toHaveBeenCalled();
      vi.advanceTimersByTime(1);
      expect(onRefreshRequested).toHaveBeenCalledTimes(1);
      expect(onRefreshRequested).toHaveBeenCalledWith({ reason: 'interval' });
    });

    it('rejects malformed settings and leaves the coordinator uninitialized', () => {
      coordinator.init(liveDashboard);

      expect(() => coordinator.init({ refresh: 'often' })).toThrow(InvalidDashboardSettingsError);
      expect(coordinator.isActive).toBe(false);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('rejects a saved range that cannot be resolved', () => {
      expect(() => coordinator.init({ ...liveDashboard, time: { from: 'now-1fortnight', to: 'now' } })).toThrow(
        InvalidExpressionError
      );
      expect(coordinator.isActive).toBe(false);
      expect(vi.getTimerCount()).toBe(0);
    });
  });

  describe('before init', () => {
    it('throws from every session operation', () => {
      expect(() => coordinator.getResolvedRange()).toThrow('Dashboard session has not been initialized');
      expect(() => coordinator.setAutoRefresh('10s')).toThrow('Dashboard session has not been initialized');
      expect(() => coordinator.refreshDashboard()).toThrow('Dashboard session has not been initialized');
    });

    it('treats dispose as a no-op', () => {
      expect(() => coordinator.dispose()).not.toThrow();
    });
  });

  describe('setRange', () => {
    beforeEach(() => {
      coordinator.init(liveDashboard);
    });

    it('notifies observers, then requests a refresh on the next timer turn', () => {
      const sequence: string[] = [];
      coordinator.subscribe({
        onTimeRangeChanged: (event) => sequence.push(`changed ${event.raw.from} ${event.raw.to} manual=${event.manual}`),
        onRefreshRequested: (event) => {
          sequence.push(`refresh ${event.reason}`);
        },
      });

      coordinator.setRange({ from: 'now-1h', to: 'now' }, false);
      expect(sequence).toEqual(['changed now-1h now manual=false']);

      vi.advanceTimersByTime(0);
      expect(sequence).toEqual(['changed now-1h now manual=false', 'refresh range-changed']);
    });

    it('accepts decoded boundaries and address-bar strings', () => {
      coordinator.setRange({ from: absolute(T0), to: '20230102' });

      expect(coordinator.getForAddressBar()).toEqual({ from: String(T0), to: String(T0 + 86_400_000) });
    });

    it('rejects an undecodable string before touching the range', () => {
      expect(() => coordinator.setRange({ from: 'garbage', to: 'now' })).toThrow(InvalidExpressionError);
      expect(coordinator.getForAddressBar()).toEqual({ from: 'now-6h', to: 'now' });
    });

    describe('WHEN the range is frozen with an absolute "to" and refresh is active', () => {
      it('SHOULD idle the scheduler and restore the interval once "to" is relative again', () => {
        coordinator.setRange({ from: relative('now-1h'), to: absolute(T0) });

        expect(coordinator.schedulerState).toBe('idle');
        expect(coordinator.pendingTimerCount).toBe(0);
        expect(coordinator.getRefreshInterval()).toBeUndefined();

        coordinator.setRange({ from: relative('now-1h'), to: relative('now') });

        expect(coordinator.schedulerState).toBe('armed');
        expect(coordinator.pendingTimerCount).toBe(1);
        expect(coordinator.getRefreshInterval()).toBe('30s');
        expect(coordinator.nextRefreshAt).toBe(NOW + 30_000);
      });

      it('SHOULD not restore the paused interval after the user picks another one', () => {
        coordinator.setRange({ from: relative('now-1h'), to: absolute(T0) });
        coordinator.setAutoRefresh('1m');

        coordinator.setRange({ from: relative('now-1h'), to: relative('now') });

        expect(coordinator.getRefreshInterval()).toBe('1m');
      });
    });
  });

  describe('auto-refresh', () => {
    it('requests a refresh each interval with a range that moves with the clock', () => {
      const ends: string[] = [];
      coordinator.subscribe({
        onRefreshRequested: () => {
          ends.push(coordinator.getResolvedRange().to.toISOString());
        },
      });
      coordinator.init({ ...liveDashboard, refresh: '10s' });

      vi.advanceTimersByTime(30_000);

      expect(ends).toEqual(['2023-01-08T00:00:10.000Z', '2023-01-08T00:00:20.000Z', '2023-01-08T00:00:30.000Z']);
      expect(vi.getTimerCount()).toBe(1);
    });

    it('replaces the interval on setAutoRefresh', () => {
      coordinator.init(liveDashboard);

      coordinator.setAutoRefresh('1m');

      expect(coordinator.getRefreshInterval()).toBe('1m');
      expect(coordinator.nextRefreshAt).toBe(NOW + 60_000);
      expect(coordinator.getDashboardSettings().refresh).toBe('1m');
      expect(logger.info).toHaveBeenCalledWith('Auto-refresh set to 1m');
    });

    it('keeps the current schedule when the new interval is malformed', () => {
      coordinator.init(liveDashboard);

      expect(() => coordinator.setAutoRefresh('soon')).toThrow(InvalidIntervalError);
      expect(coordinator.getRefreshInterval()).toBe('30s');
      expect(coordinator.nextRefreshAt).toBe(NOW + 30_000);
    });

    it('turns auto-refresh off', () => {
      coordinator.init(liveDashboard);

      coordinator.setAutoRefresh(false);

      expect(coordinator.schedulerState).toBe('idle');
      expect(coordinator.getDashboardSettings().refresh).toBe(false);
      expect(logger.info).toHaveBeenCalledWith('Auto-refresh disabled');
    });

    it('delivers a manual refresh synchronously', () => {
      const onRefreshRequested = vi.fn();
      coordinator.subscribe({ onRefreshRequested });
      coordinator.init(liveDashboard);

      coordinator.refreshDashboard();

      expect(onRefreshRequested).toHaveBeenCalledTimes(1);
      expect(onRefreshRequested).toHaveBeenCalledWith({ reason: 'manual' });
    });
  });

  describe('address bar', () => {
    it('reads the initial range and writes every change back', () => {
      const addressBar = new QueryStringAddressBar('orgId=1&from=now-24h&to=now');
      const session = new SessionCoordinator({ addressBar, logger });

      session.init(liveDashboard);
      expect(session.getForAddressBar()).toEqual({ from: 'now-24h', to: 'now' });

      session.setRange({ from: 'now-1h', to: absolute(T0) });
      expect(addressBar.toString()).toBe(`orgId=1&from=now-1h&to=${T0}`);

      session.dispose();
    });

    it('pins a shareable range to the current instant', () => {
      coordinator.init({ ...liveDashboard, time: { from: 'now-7d', to: 'now' } });

      expect(coordinator.getRangeForUrl()).toEqual({ from: String(T0), to: String(NOW) });
      expect(coordinator.getForAddressBar()).toEqual({ from: 'now-7d', to: 'now' });
    });
  });

  describe('dispose', () => {
    it('leaves no pending timers', () => {
      coordinator.init(liveDashboard);
      coordinator.setRange({ from: 'now-1h', to: 'now' });

      coordinator.dispose();

      expect(vi.getTimerCount()).toBe(0);
      expect(coordinator.isActive).toBe(false);
    });

    it('does not affect another coordinator', () => {
      const other = new SessionCoordinator({ logger });
      other.init(liveDashboard);
      coordinator.init(liveDashboard);

      coordinator.dispose();

      expect(other.schedulerState).toBe('armed');
      expect(vi.getTimerCount()).toBe(1);
      other.dispose();
    });
  });

  it('returns the dashboard as the session modified it', () => {
    coordinator.init(liveDashboard);
    coordinator.setRange({ from: 'now-1h', to: absolute(T0) });

    const settings = coordinator.getDashboardSettings();

    expect(settings.uid).toBe('ops-overview');
    expect(settings.refresh).toBe(false);
    expect(settings.time.to).toEqual({ kind: 'absolute', at: expect.anything() });
  });
});
