export interface MetricStats {
  count: number;
  sum: number;
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
}

export class Counter {
  private value = 0;

  inc(delta = 1): void {
    this.value += delta;
  }

  get(): number {
    return this.value;
  }
}

export class Gauge {
  private value = 0;

  set(value: number): void {
    this.value = value;
  }

  get(): number {
    return this.value;
  }
}

export class Histogram {
  private values: number[] = [];

  constructor(private readonly maxSamples = 1000) {}

  observe(value: number): void {
    this.values.push(value);
    if (this.values.length > this.maxSamples) {
      this.values.shift();
    }
  }

  getStats(): MetricStats {
    const sorted = [...this.values].sort((a, b) => a - b);
    const count = sorted.length;
    if (count === 0) {
      return { count: 0, sum: 0, min: 0, max: 0, avg: 0, p50: 0, p95: 0, p99: 0 };
    }

    const sum = sorted.reduce((a, b) => a + b, 0);
    const at = (q: number): number => sorted[Math.min(count - 1, Math.floor(count * q))] ?? 0;

    return {
      count,
      sum,
      min: sorted[0] ?? 0,
      max: sorted[count - 1] ?? 0,
      avg: sum / count,
      p50: at(0.5),
      p95: at(0.95),
      p99: at(0.99),
    };
  }
}

/**
 * Process-local registry. Instantiate one per orchestrator; nothing here is global.
 */
export class EngineMetrics {
  private counters = new Map<string, Counter>();
  private gauges = new Map<string, Gauge>();
  private histograms = new Map<string, Histogram>();
  private readonly startTime = Date.now();

  readonly cyclesTotal = this.counter('lanwatch_cycles_total');
  readonly cycleErrors = this.counter('lanwatch_cycle_errors_total');
  readonly cyclesCancelled = this.counter('lanwatch_cycles_cancelled_total');
  readonly cyclesJoined = this.counter('lanwatch_cycles_joined_total');
  readonly cycleDuration = this.histogram('lanwatch_cycle_duration_ms');
  readonly devicesOnline = this.gauge('lanwatch_devices', { status: 'online' });
  readonly devicesOffline = this.gauge('lanwatch_devices', { status: 'offline' });
  readonly devicesUnknown = this.gauge('lanwatch_devices', { status: 'unknown' });
  readonly historySize = this.gauge('lanwatch_history_entries');

  private counter(name: string, labels: Record<string, string> = {}): Counter {
    const key = `${name}:${JSON.stringify(labels)}`;
    const existing = this.counters.get(key);
    if (existing) return existing;
    const created = new Counter();
    this.counters.set(key, created);
    return created;
  }

  private gauge(name: string, labels: Record<string, string> = {}): Gauge {
    const key = `${name}:${JSON.stringify(labels)}`;
    const existing = this.gauges.get(key);
    if (existing) return existing;
    const created = new Gauge();
    this.gauges.set(key, created);
    return created;
  }

  private histogram(name: string, labels: Record<string, string> = {}): Histogram {
    const key = `${name}:${JSON.stringify(labels)}`;
    const existing = this.histograms.get(key);
    if (existing) return existing;
    const created = new Histogram();
    this.histograms.set(key, created);
    return created;
  }

  labeledCounter(name: string, labels: Record<string, string>): Counter {
    return this.counter(name, labels);
  }

  recordCycle(durationMs: number, success: boolean): void {
    this.cyclesTotal.inc();
    this.cycleDuration.observe(durationMs);
    if (!success) {
      this.cycleErrors.inc();
    }
  }

  recordDegradedSource(source: string): void {
    this.labeledCounter('lanwatch_source_failures_total', { source }).inc();
  }

  recordRoster(counts: { online: number; offline: number; unknown: number }): void {
    this.devicesOnline.set(counts.online);
    this.devicesOffline.set(counts.offline);
    this.devicesUnknown.set(counts.unknown);
  }

  getSummary(): {
    uptime: number;
    cycles: { total: number; errors: number; cancelled: number; joined: number; errorRate: number; avgDuration: number };
    devices: { online: number; offline: number; unknown: number };
    historyEntries: number;
  } {
    const total = this.cyclesTotal.get();
    return {
      uptime: Date.now() - this.startTime,
      cycles: {
        total,
        errors: this.cycleErrors.get(),
        cancelled: this.cyclesCancelled.get(),
        joined: this.cyclesJoined.get(),
        errorRate: total > 0 ? (this.cycleErrors.get() / total) * 100 : 0,
        avgDuration: this.cycleDuration.getStats().avg,
      },
      devices: {
        online: this.devicesOnline.get(),
        offline: this.devicesOffline.get(),
        unknown: this.devicesUnknown.get(),
      },
      historyEntries: this.historySize.get(),
    };
  }
}
