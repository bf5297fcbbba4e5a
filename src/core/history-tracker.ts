import { createChildLogger } from '../utils/logger.js';
import { CircularBuffer } from '../utils/async-helpers.js';
import { ContractViolationError, ErrorCode } from '../utils/errors.js';
import type {
  HealthSummary,
  HistoryEntry,
  MetricTrend,
  TrendDirection,
  TrendMetric,
  TrendReport,
} from '../types/analysis.js';

const logger = createChildLogger('history-tracker');

export const DEFAULT_HISTORY_CAPACITY = 288;
export const DEFAULT_TREND_HOURS = 24;

const INCREASE_RATIO = 1.2;
const DECREASE_RATIO = 0.8;

export class HistoryTracker {
  private readonly entries: CircularBuffer<HistoryEntry>;

  constructor(capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ContractViolationError(
        ErrorCode.INVALID_HISTORY_CAPACITY,
        `History capacity must be a positive integer, got ${capacity}`,
        { context: { capacity } }
      );
    }
    this.entries = new CircularBuffer<HistoryEntry>(capacity);
  }

  get capacity(): number {
    return this.entries.maxSize;
  }

  get size(): number {
    return this.entries.size;
  }

  append(summary: HealthSummary): HistoryEntry {
    const entry: HistoryEntry = Object.freeze({
      ...summary,
      timestamp: new Date(summary.timestamp.getTime()),
      offlineList: Object.freeze([...summary.offlineList]),
      alerts: Object.freeze([...summary.alerts]),
    });
    this.entries.push(entry);
    logger.debug({ size: this.entries.size, capacity: this.capacity }, 'History entry appended');
    return entry;
  }

  list(): HistoryEntry[] {
    return this.entries.toArray();
  }

  latest(): HistoryEntry | undefined {
    return this.entries.last();
  }

  clear(): void {
    this.entries.clear();
  }

  trend(windowHours: number = DEFAULT_TREND_HOURS, now: Date = new Date()): TrendReport {
    const hours = Number.isFinite(windowHours) && windowHours > 0 ? windowHours : DEFAULT_TREND_HOURS;
    if (hours !== windowHours) {
      logger.warn({ windowHours, fallback: hours }, 'Invalid trend window, using default');
    }

    const cutoff = now.getTime() - hours * 60 * 60 * 1000;
    const recent = this.entries.toArray().filter(e => e.timestamp.getTime() > cutoff);

    if (recent.length === 0) {
      return { status: 'no_data', periodHours: hours, message: 'No history in the requested window' };
    }

    const mid = Math.floor(recent.length / 2);
    const firstHalf = recent.slice(0, mid);
    const secondHalf = recent.slice(mid);

    const trendOf = (metric: TrendMetric): MetricTrend => {
      const values = recent.map(e => e[metric]);
      return {
        avg: average(values),
        max: Math.max(...values),
        min: Math.min(...values),
        trend: recent.length < 2
          ? 'stable'
          : classifyTrend(
              average(firstHalf.map(e => e[metric])),
              average(secondHalf.map(e => e[metric]))
            ),
      };
    };

    const metrics: Record<TrendMetric, MetricTrend> = {
      packetLoss: trendOf('packetLoss'),
      avgLatencyMs: trendOf('avgLatencyMs'),
      wifiClients: trendOf('wifiClients'),
      bandwidthInMbps: trendOf('bandwidthInMbps'),
      bandwidthOutMbps: trendOf('bandwidthOutMbps'),
    };

    return { status: 'ok', periodHours: hours, dataPoints: recent.length, metrics };
  }
}

export function classifyTrend(firstAvg: number, secondAvg: number): TrendDirection {
  if (secondAvg > firstAvg * INCREASE_RATIO) return 'increasing';
  if (secondAvg < firstAvg * DECREASE_RATIO) return 'decreasing';
  return 'stable';
}

function average(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
