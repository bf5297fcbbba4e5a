import { EventEmitter } from 'eventemitter3';
import { createChildLogger } from '../utils/logger.js';
import { withTimeout, TimeoutError } from '../utils/async-helpers.js';
import {
  CycleCancelledError,
  DataUnavailableError,
  EngineError,
  ErrorCode,
} from '../utils/errors.js';
import { EngineMetrics } from '../utils/metrics.js';
import {
  isUnrecognizedPayload,
  normalizeBandwidth,
  normalizeDiscovery,
  normalizeLeases,
  normalizeMetrics,
  normalizeObservations,
  normalizeWifiStats,
} from '../infra/snapshot-normalizer.js';
import { ChannelCongestionScorer } from './channel-congestion-scorer.js';
import { DeviceRegistry, DeviceRoster } from './device-registry.js';
import { HealthMetricsAggregator } from './health-metrics-aggregator.js';
import { HistoryTracker } from './history-tracker.js';
import { IssueDeduplicator } from './issue-deduplicator.js';
import { WifiEnvironmentAnalyzer, type WifiEnvironmentReport } from './wifi-environment-analyzer.js';
import type { Config } from '../config/index.js';
import type { PayloadSource } from '../infra/snapshot-normalizer.js';
import type { NetworkSources } from '../infra/sources.js';
import type {
  BandwidthSample,
  Device,
  DeviceStatus,
  NetworkMetricsSample,
  WifiStats,
} from '../types/network.js';
import type {
  HistoryEntry,
  Issue,
  RecommendationKey,
  TrendReport,
} from '../types/analysis.js';

const logger = createChildLogger('analysis-orchestrator');

export type SourceName = PayloadSource;

export interface AnalysisContext {
  sources: NetworkSources;
  config: Config;
  registry?: DeviceRegistry | undefined;
  aggregator?: HealthMetricsAggregator | undefined;
  history?: HistoryTracker | undefined;
  deduplicator?: IssueDeduplicator | undefined;
  scorer?: ChannelCongestionScorer | undefined;
  environmentAnalyzer?: WifiEnvironmentAnalyzer | undefined;
  metrics?: EngineMetrics | undefined;
  clock?: (() => Date) | undefined;
}

export interface CycleResult {
  timestamp: Date;
  summary: HistoryEntry;
  issues: Issue[];
  roster: DeviceRoster;
  wifiStats: WifiStats;
  bandwidth: BandwidthSample;
  metrics: NetworkMetricsSample;
  degradedSources: SourceName[];
}

export interface OfflineReport {
  count: number;
  devices: Device[];
  recommendation: RecommendationKey;
}

export interface RunCycleOptions {
  signal?: AbortSignal | undefined;
}

export interface AnalysisOrchestratorEvents {
  cycleStarted: (startedAt: Date) => void;
  cycleComplete: (result: CycleResult) => void;
  cycleFailed: (error: EngineError) => void;
}

export class AnalysisOrchestrator extends EventEmitter<AnalysisOrchestratorEvents> {
  private readonly sources: NetworkSources;
  private readonly config: Config;
  private readonly registry: DeviceRegistry;
  private readonly aggregator: HealthMetricsAggregator;
  private readonly history: HistoryTracker;
  private readonly deduplicator: IssueDeduplicator;
  private readonly environmentAnalyzer: WifiEnvironmentAnalyzer;
  private readonly engineMetrics: EngineMetrics;
  private readonly clock: () => Date;

  private inFlight: Promise<CycleResult> | null = null;
  private lastRoster: DeviceRoster = DeviceRoster.empty();
  private lastResult: CycleResult | null = null;

  constructor(context: AnalysisContext) {
    super();
    this.sources = context.sources;
    this.config = context.config;
    this.registry = context.registry ?? new DeviceRegistry({
      offlineThresholdMinutes: context.config.analysis.offlineThresholdMinutes,
    });
    this.aggregator = context.aggregator ?? new HealthMetricsAggregator();
    this.history = context.history ?? new HistoryTracker(context.config.history.capacity);
    this.deduplicator = context.deduplicator ?? new IssueDeduplicator({
      policy: context.config.issues.repeatPolicy,
      suppressWindowMinutes: context.config.issues.suppressWindowMinutes,
    });
    this.environmentAnalyzer = context.environmentAnalyzer ?? new WifiEnvironmentAnalyzer(
      context.scorer ?? new ChannelCongestionScorer()
    );
    this.engineMetrics = context.metrics ?? new EngineMetrics();
    this.clock = context.clock ?? (() => new Date());
  }

  isRunning(): boolean {
    return this.inFlight !== null;
  }

  // A caller that joins a running cycle shares its outcome, including a
  // CycleCancelledError when the signal of the caller that started it aborts.
  runCycle(options: RunCycleOptions = {}): Promise<CycleResult> {
    if (this.inFlight) {
      this.engineMetrics.cyclesJoined.inc();
      logger.debug('Cycle already running, joining it');
      return this.inFlight;
    }

    const cycle = this.executeCycle(options.signal).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async executeCycle(signal: AbortSignal | undefined): Promise<CycleResult> {
    const startedMs = Date.now();
    const now = this.clock();
    const degraded: SourceName[] = [];
    this.emit('cycleStarted', now);
    logger.info({ startedAt: now.toISOString() }, 'Analysis cycle started');

    try {
      ensureNotAborted(signal, 'discovery');
      const discovery = await this.collect(
        'discovery', () => this.sources.discovery.fetchDiscoveryRecords(), normalizeDiscovery, degraded
      );
      ensureNotAborted(signal, 'leases');
      const leases = await this.collect(
        'leases', () => this.sources.leases.fetchLeases(), normalizeLeases, degraded
      );
      const roster = this.registry.refresh(discovery, leases, now);

      ensureNotAborted(signal, 'bandwidth');
      const bandwidth = await this.collect(
        'bandwidth', () => this.sources.bandwidth.fetchBandwidth(), normalizeBandwidth, degraded
      );
      ensureNotAborted(signal, 'wifiStats');
      const wifiStats = await this.collect(
        'wifiStats', () => this.sources.wifiStats.fetchWifiStats(), normalizeWifiStats, degraded
      );
      ensureNotAborted(signal, 'metrics');
      const metricsSample = await this.collect(
        'metrics', () => this.sources.metrics.fetchMetrics(), normalizeMetrics, degraded
      );
      ensureNotAborted(signal, 'commit');

      // No awaits past this point: the commit below is all-or-nothing
      const { summary, issues } = this.aggregator.analyze(
        roster,
        bandwidth,
        wifiStats,
        metricsSample,
        this.config.analysis,
        now
      );
      const emitted = this.deduplicator.filter(issues, now);
      const entry = this.history.append(summary);

      const result: CycleResult = {
        timestamp: now,
        summary: entry,
        issues: emitted,
        roster,
        wifiStats,
        bandwidth,
        metrics: metricsSample,
        degradedSources: degraded,
      };
      this.lastRoster = roster;
      this.lastResult = result;

      const durationMs = Date.now() - startedMs;
      this.engineMetrics.recordCycle(durationMs, true);
      this.engineMetrics.recordRoster(roster.counts());
      this.engineMetrics.historySize.set(this.history.size);

      logger.info({
        durationMs,
        devices: roster.size,
        issues: emitted.length,
        degradedSources: degraded,
      }, 'Analysis cycle complete');
      this.emit('cycleComplete', result);
      return result;
    } catch (err) {
      const error = EngineError.fromError(err, ErrorCode.CYCLE_FAILED);
      if (error instanceof CycleCancelledError) {
        this.engineMetrics.cyclesCancelled.inc();
        logger.info({ step: error.context?.['step'] }, 'Analysis cycle cancelled, history unchanged');
      } else {
        this.engineMetrics.recordCycle(Date.now() - startedMs, false);
        logger.error({ err: error.toJSON() }, 'Analysis cycle failed');
      }
      this.emit('cycleFailed', error);
      throw error;
    }
  }

  // A failing, slow or unreadable collaborator degrades to empty defaults
  private async collect<T>(
    source: SourceName,
    fetcher: () => Promise<unknown>,
    normalize: (raw: unknown) => T,
    degraded: SourceName[]
  ): Promise<T> {
    const timeoutMs = this.config.sources.timeoutMs;
    let raw: unknown;
    try {
      raw = await withTimeout(fetcher(), timeoutMs, `Source '${source}' timed out after ${timeoutMs}ms`);
    } catch (err) {
      this.markDegraded(source, new DataUnavailableError(
        source,
        err instanceof Error ? err.message : String(err),
        {
          code: err instanceof TimeoutError ? ErrorCode.SOURCE_TIMEOUT : ErrorCode.SOURCE_UNAVAILABLE,
          cause: err instanceof Error ? err : undefined,
        }
      ), degraded);
      return normalize(undefined);
    }

    if (isUnrecognizedPayload(source, raw)) {
      this.markDegraded(source, new DataUnavailableError(
        source,
        `Source '${source}' returned no recognised fields`,
        { code: ErrorCode.SOURCE_PAYLOAD_INVALID }
      ), degraded);
    }
    return normalize(raw);
  }

  private markDegraded(source: SourceName, error: DataUnavailableError, degraded: SourceName[]): void {
    degraded.push(source);
    this.engineMetrics.recordDegradedSource(source);
    logger.warn({ err: error.toJSON() }, 'Source unavailable, using defaults for this cycle');
  }

  async scanWifiEnvironment(): Promise<WifiEnvironmentReport> {
    const source = this.sources.wifiObservations;
    if (!source) {
      logger.warn('No wifi observation source configured, reporting an empty environment');
      return this.environmentAnalyzer.analyze([], this.clock());
    }
    const observations = await this.collect(
      'wifiObservations', () => source.fetchObservations(), normalizeObservations, []
    );
    return this.environmentAnalyzer.analyze(observations, this.clock());
  }

  getLastResult(): CycleResult | null {
    return this.lastResult;
  }

  getRoster(): DeviceRoster {
    return this.lastRoster;
  }

  getDevices(status?: DeviceStatus): Device[] {
    return status === undefined ? this.lastRoster.list() : this.lastRoster.byStatus(status);
  }

  getDevice(ip: string): Device | undefined {
    return this.lastRoster.get(ip);
  }

  getOfflineReport(): OfflineReport {
    const devices = this.lastRoster.byStatus('offline');
    return {
      count: devices.length,
      devices,
      recommendation: devices.length > 0 ? 'check_device_power_and_link' : 'no_action_needed',
    };
  }

  getHistory(): HistoryEntry[] {
    return this.history.list();
  }

  getTrends(hours: number = this.config.history.defaultTrendHours): TrendReport {
    return this.history.trend(hours, this.clock());
  }

  getMetrics(): EngineMetrics {
    return this.engineMetrics;
  }
}

function ensureNotAborted(signal: AbortSignal | undefined, step: string): void {
  if (signal?.aborted) {
    throw new CycleCancelledError(step, {
      cause: signal.reason instanceof Error ? signal.reason : undefined,
    });
  }
}
