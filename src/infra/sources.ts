import type { z } from 'zod';
import type {
  BandwidthSampleSchema,
  DiscoveryRecordSchema,
  LeaseRecordSchema,
  NetworkMetricsSampleSchema,
  WifiNetworkObservationSchema,
  WifiStatsSchema,
} from '../types/network.js';

type RawTimestamp = string | number | Date | null | undefined;

// Collector wire format, snake_case as the collectors emit it
export interface WireDiscoveryRecord {
  ip: string;
  mac?: string | undefined;
  last_seen?: RawTimestamp;
}

export interface WireLeaseRecord {
  ip: string;
  mac?: string | undefined;
  hostname?: string | undefined;
  expires_at?: RawTimestamp;
}

export interface WireBandwidthSample {
  in_mbps?: number | undefined;
  out_mbps?: number | undefined;
}

export interface WireAccessPoint {
  name?: string | undefined;
  band?: string | undefined;
  clients?: number | undefined;
  channel?: number | undefined;
}

export interface WireWifiStats {
  band_2g_clients?: number | undefined;
  band_5g_clients?: number | undefined;
  total_clients?: number | undefined;
  access_points?: WireAccessPoint[] | undefined;
}

export interface WireNetworkMetricsSample {
  packet_loss_percent?: number | undefined;
  avg_latency_ms?: number | undefined;
  max_latency_ms?: number | undefined;
  jitter_ms?: number | undefined;
  tcp_retries?: number | undefined;
  udp_errors?: number | undefined;
}

export interface WireWifiNetworkObservation {
  ssid: string;
  bssid: string;
  signal_dbm: number;
  signal_percent: number;
  channel: number;
  frequency: number;
  band: string;
  security: string;
  hidden: boolean;
}

// Collaborators hand over loosely-typed payloads in either spelling; the
// snapshot normalizer turns them into the parsed types.
export type RawDiscoveryRecord = z.input<typeof DiscoveryRecordSchema> | WireDiscoveryRecord;
export type RawLeaseRecord = z.input<typeof LeaseRecordSchema> | WireLeaseRecord;
export type RawBandwidthSample = z.input<typeof BandwidthSampleSchema> | WireBandwidthSample;
export type RawWifiStats = z.input<typeof WifiStatsSchema> | WireWifiStats;
export type RawNetworkMetricsSample = z.input<typeof NetworkMetricsSampleSchema> | WireNetworkMetricsSample;
export type RawWifiNetworkObservation = z.input<typeof WifiNetworkObservationSchema> | WireWifiNetworkObservation;

/** ARP / neighbor-table style discovery. */
export interface DiscoverySource {
  fetchDiscoveryRecords(): Promise<readonly RawDiscoveryRecord[]>;
}

/** Actively leased DHCP addresses. */
export interface LeaseSource {
  fetchLeases(): Promise<readonly RawLeaseRecord[]>;
}

export interface BandwidthSource {
  fetchBandwidth(): Promise<RawBandwidthSample>;
}

export interface WifiStatsSource {
  fetchWifiStats(): Promise<RawWifiStats>;
}

export interface MetricsSource {
  fetchMetrics(): Promise<RawNetworkMetricsSample>;
}

export interface WifiObservationSource {
  fetchObservations(): Promise<readonly RawWifiNetworkObservation[]>;
}

export interface NetworkSources {
  discovery: DiscoverySource;
  leases: LeaseSource;
  bandwidth: BandwidthSource;
  wifiStats: WifiStatsSource;
  metrics: MetricsSource;
  wifiObservations?: WifiObservationSource | undefined;
}
