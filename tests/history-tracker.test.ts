import { describe, it, expect } from 'vitest';
import { HistoryTracker, classifyTrend } from '../src/core/history-tracker.js';
import { ContractViolationError, ErrorCode } from '../src/utils/errors.js';
import type { HealthSummary } from '../src/types/analysis.js';

const NOW = new Date('2026-01-15T12:00:00.000Z');

function hoursAgo(hours: number): Date {
  return new Date(NOW.getTime() - hours * 60 * 60 * 1000);
}

function summary(timestamp: Date, overrides: Partial<HealthSummary> = {}): HealthSummary {
  return {
    timestamp,
    totalDevices: 3,
    onlineDevices: 3,
    offlineDevices: 0,
    unknownDevices: 0,
    offlineList: [],
    packetLoss: 0,
    avgLatencyMs: 10,
    wifiClients: 5,
    bandwidthInMbps: 10,
    bandwidthOutMbps: 2,
    alerts: ['Network healthy'],
    ...overrides,
  };
}

describe('HistoryTracker', () => {
  it('should reject a capacity that is not a positive integer', () => {
    for (const capacity of [0, -1, 1.5, Number.NaN]) {
      expect(() => new HistoryTracker(capacity)).toThrow(ContractViolationError);
    }
    try {
      new HistoryTracker(0);
    } catch (err) {
      expect(err).toMatchObject({ code: ErrorCode.INVALID_HISTORY_CAPACITY });
    }
  });

  it('should default to 288 entries', () => {
    expect(new HistoryTracker().capacity).toBe(288);
  });

  it('should evict the oldest entries beyond capacity', () => {
    const history = new HistoryTracker(2);
    history.append(summary(hoursAgo(3), { wifiClients: 1 }));
    history.append(summary(hoursAgo(2), { wifiClients: 2 }));
    history.append(summary(hoursAgo(1), { wifiClients: 3 }));

    expect(history.size).toBe(2);
    expect(history.list().map(e => e.wifiClients)).toEqual([2, 3]);
    expect(history.latest()?.wifiClients).toBe(3);
  });

  it('should store frozen copies isolated from the caller', () => {
    const history = new HistoryTracker(5);
    const source = summary(NOW, { offlineList: ['10.0.0.1'] });
    const entry = history.append(source);
    source.offlineList.push('10.0.0.2');
    source.timestamp.setTime(0);

    expect(entry.offlineList).toEqual(['10.0.0.1']);
    expect(entry.timestamp).toEqual(NOW);
    expect(Object.isFrozen(entry)).toBe(true);
  });

  it('should clear all entries', () => {
    const history = new HistoryTracker(5);
    history.append(summary(NOW));
    history.clear();
    expect(history.size).toBe(0);
    expect(history.latest()).toBeUndefined();
  });

  describe('trend', () => {
    it('should report no data for an empty window', () => {
      const history = new HistoryTracker(10);
      history.append(summary(hoursAgo(30)));
      expect(history.trend(24, NOW)).toEqual({
        status: 'no_data',
        periodHours: 24,
        message: 'No history in the requested window',
      });
    });

    it('should compare the halves of the window', () => {
      const history = new HistoryTracker(10);
      history.append(summary(hoursAgo(30), { avgLatencyMs: 900 }));
      history.append(summary(hoursAgo(24), { avgLatencyMs: 900 }));
      history.append(summary(hoursAgo(3), { avgLatencyMs: 10, packetLoss: 2, bandwidthInMbps: 10 }));
      history.append(summary(hoursAgo(2), { avgLatencyMs: 10, packetLoss: 2, bandwidthInMbps: 10 }));
      history.append(summary(hoursAgo(1), { avgLatencyMs: 20, packetLoss: 1, bandwidthInMbps: 11 }));
      history.append(summary(NOW, { avgLatencyMs: 30, packetLoss: 1, bandwidthInMbps: 11 }));

      const report = history.trend(24, NOW);
      if (report.status !== 'ok') throw new Error('expected trend data');

      expect(report.periodHours).toBe(24);
      expect(report.dataPoints).toBe(4);
      expect(report.metrics.avgLatencyMs).toEqual({ avg: 17.5, max: 30, min: 10, trend: 'increasing' });
      expect(report.metrics.packetLoss).toEqual({ avg: 1.5, max: 2, min: 1, trend: 'decreasing' });
      expect(report.metrics.bandwidthInMbps.trend).toBe('stable');
      expect(report.metrics.wifiClients).toEqual({ avg: 5, max: 5, min: 5, trend: 'stable' });
    });

    it('should call a single data point stable', () => {
      const history = new HistoryTracker(10);
      history.append(summary(hoursAgo(1), { avgLatencyMs: 40 }));
      const report = history.trend(24, NOW);
      if (report.status !== 'ok') throw new Error('expected trend data');
      expect(report.dataPoints).toBe(1);
      expect(report.metrics.avgLatencyMs).toEqual({ avg: 40, max: 40, min: 40, trend: 'stable' });
    });

    it('should fall back to 24 hours for an invalid window', () => {
      const history = new HistoryTracker(10);
      history.append(summary(hoursAgo(20)));
      const report = history.trend(-5, NOW);
      expect(report.periodHours).toBe(24);
      expect(report.status).toBe('ok');
    });

    it('should honor a shorter window', () => {
      const history = new HistoryTracker(10);
      history.append(summary(hoursAgo(5)));
      history.append(summary(hoursAgo(1)));
      const report = history.trend(2, NOW);
      expect(report.status === 'ok' ? report.dataPoints : 0).toBe(1);
    });
  });
});

describe('classifyTrend', () => {
  it('should use a twenty percent band', () => {
    expect(classifyTrend(10, 12.1)).toBe('increasing');
    expect(classifyTrend(10, 12)).toBe('stable');
    expect(classifyTrend(10, 8)).toBe('stable');
    expect(classifyTrend(10, 7.9)).toBe('decreasing');
    expect(classifyTrend(0, 0)).toBe('stable');
  });
});
