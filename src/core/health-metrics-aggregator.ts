import { createChildLogger } from '../utils/logger.js';
import type { AnalysisThresholds } from '../config/index.js';
import type { DeviceRoster } from './device-registry.js';
import type {
  BandwidthSample,
  NetworkMetricsSample,
  WifiStats,
} from '../types/network.js';
import type { HealthSummary, Issue } from '../types/analysis.js';

const logger = createChildLogger('health-metrics-aggregator');

const OFFLINE_IPS_IN_DESCRIPTION = 5;

export interface HealthAnalysis {
  summary: HealthSummary;
  issues: Issue[];
}

export class HealthMetricsAggregator {
  analyze(
    roster: DeviceRoster,
    bandwidth: BandwidthSample,
    wifiStats: WifiStats,
    metrics: NetworkMetricsSample,
    thresholds: AnalysisThresholds,
    now: Date = new Date()
  ): HealthAnalysis {
    const issues = this.detectIssues(roster, wifiStats, metrics, thresholds);
    const summary = this.buildSummary(roster, bandwidth, wifiStats, metrics, issues, now);

    logger.debug({
      issues: issues.length,
      critical: issues.filter(i => i.severity === 'critical').length,
    }, 'Health analysis complete');

    return { summary, issues };
  }

  detectIssues(
    roster: DeviceRoster,
    wifiStats: WifiStats,
    metrics: NetworkMetricsSample,
    thresholds: AnalysisThresholds
  ): Issue[] {
    const issues: Issue[] = [];

    const offline = roster.byStatus('offline');
    if (offline.length > 0) {
      const ips = offline.map(d => d.ip);
      issues.push({
        severity: 'warning',
        type: 'device_offline',
        title: `${offline.length} device(s) offline`,
        description: `Offline devices: ${ips.slice(0, OFFLINE_IPS_IN_DESCRIPTION).join(', ')}`,
        recommendation: 'check_device_power_and_link',
        details: {
          devices: offline.map(d => ({
            ip: d.ip,
            mac: d.mac,
            hostname: d.hostname,
            lastSeen: d.lastSeen?.toISOString() ?? null,
          })),
        },
      });
    }

    const packetLoss = metrics.packetLossPercent;
    if (packetLoss >= thresholds.packetLossCritical) {
      issues.push({
        severity: 'critical',
        type: 'packet_loss',
        title: `Packet loss too high: ${packetLoss}%`,
        description: `Current packet loss is ${packetLoss}% (critical at ${thresholds.packetLossCritical}%)`,
        recommendation: 'check_congestion_or_cabling',
        details: { packetLossPercent: packetLoss, threshold: thresholds.packetLossCritical },
      });
    } else if (packetLoss >= thresholds.packetLossWarning) {
      issues.push({
        severity: 'warning',
        type: 'packet_loss',
        title: `Packet loss elevated: ${packetLoss}%`,
        description: `Current packet loss is ${packetLoss}% (warning at ${thresholds.packetLossWarning}%)`,
        recommendation: 'monitor_load_trend',
        details: { packetLossPercent: packetLoss, threshold: thresholds.packetLossWarning },
      });
    }

    const latency = metrics.avgLatencyMs;
    if (latency >= thresholds.latencyCriticalMs) {
      issues.push({
        severity: 'critical',
        type: 'latency',
        title: `Latency too high: ${latency}ms`,
        description: `Average latency is ${latency}ms (critical at ${thresholds.latencyCriticalMs}ms)`,
        recommendation: 'check_congestion_or_device_load',
        details: { avgLatencyMs: latency, maxLatencyMs: metrics.maxLatencyMs, threshold: thresholds.latencyCriticalMs },
      });
    } else if (latency >= thresholds.latencyWarningMs) {
      issues.push({
        severity: 'warning',
        type: 'latency',
        title: `Latency elevated: ${latency}ms`,
        description: `Average latency is ${latency}ms (warning at ${thresholds.latencyWarningMs}ms)`,
        recommendation: 'keep_monitoring',
        details: { avgLatencyMs: latency, maxLatencyMs: metrics.maxLatencyMs, threshold: thresholds.latencyWarningMs },
      });
    }

    const clients = wifiStats.totalClients;
    if (clients > thresholds.wifiClientLimit) {
      issues.push({
        severity: 'warning',
        type: 'wifi_congestion',
        title: `Too many wifi clients: ${clients}`,
        description: `${clients} wifi clients connected (limit ${thresholds.wifiClientLimit})`,
        recommendation: 'add_access_point_or_balance_load',
        details: {
          totalClients: clients,
          band2gClients: wifiStats.band2gClients,
          band5gClients: wifiStats.band5gClients,
        },
      });
    }

    if (issues.length === 0) {
      issues.push(healthyIssue());
    }

    return issues;
  }

  buildSummary(
    roster: DeviceRoster,
    bandwidth: BandwidthSample,
    wifiStats: WifiStats,
    metrics: NetworkMetricsSample,
    issues: readonly Issue[],
    now: Date = new Date()
  ): HealthSummary {
    const counts = roster.counts();
    const offlineList = roster.byStatus('offline').map(d => d.ip);

    return {
      timestamp: now,
      totalDevices: counts.total,
      onlineDevices: counts.online,
      offlineDevices: counts.offline,
      unknownDevices: counts.unknown,
      offlineList,
      packetLoss: metrics.packetLossPercent,
      avgLatencyMs: metrics.avgLatencyMs,
      wifiClients: wifiStats.totalClients,
      bandwidthInMbps: bandwidth.inMbps,
      bandwidthOutMbps: bandwidth.outMbps,
      alerts: buildAlerts(issues, offlineList.length),
    };
  }
}

export function healthyIssue(): Issue {
  return {
    severity: 'info',
    type: 'healthy',
    title: 'Network healthy',
    description: 'All indicators within thresholds',
    recommendation: 'no_action_needed',
  };
}

// Counts only; full issue text stays in the issue list
function buildAlerts(issues: readonly Issue[], offlineCount: number): string[] {
  const alerts: string[] = [];
  const critical = issues.filter(i => i.severity === 'critical').length;
  const warning = issues.filter(i => i.severity === 'warning').length;

  if (critical > 0) alerts.push(`${critical} critical issue(s) need attention`);
  if (warning > 0) alerts.push(`${warning} warning(s)`);
  if (offlineCount > 0) alerts.push(`${offlineCount} device(s) offline`);
  if (alerts.length === 0) alerts.push('Network healthy');

  return alerts;
}
