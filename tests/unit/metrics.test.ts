import { describe, it, expect } from 'vitest';
import { createMetrics, createAttributes } from '../../src/utils/metrics';

describe('Metrics', () => {
  describe('when OTel metrics are disabled', () => {
    it('returns null instrument groups', () => {
      const metrics = createMetrics({ uid: 'ops-overview' });

      expect(metrics.meter).toBeNull();
      expect(metrics.scheduler).toBeNull();
      expect(metrics.range).toBeNull();
    });

    it('lets callers record through optional chaining', () => {
      const metrics = createMetrics();

      expect(() => {
        metrics.scheduler?.ticks.add(1);
        metrics.range?.changes.add(1, { manual: 'true' });
      }).not.toThrow();
    });
  });

  describe('createAttributes', () => {
    it('adds the dashboard context to custom attributes', () => {
      const metrics = createMetrics({ uid: 'ops-overview', title: 'Ops overview' });

      expect(createAttributes(metrics, { reason: 'interval' })).toEqual({
        reason: 'interval',
        'dashboard.uid': 'ops-overview',
        'dashboard.title': 'Ops overview',
      });
    });

    it('omits the title when the dashboard has none', () => {
      const metrics = createMetrics({ uid: 'ops-overview' });

      expect(createAttributes(metrics)).toEqual({ 'dashboard.uid': 'ops-overview' });
    });

    it('returns only custom attributes without a dashboard context', () => {
      const metrics = createMetrics();

      expect(createAttributes(metrics, { param: 'from', count: 2 })).toEqual({ param: 'from', count: 2 });
    });
  });
});
