import type { z } from 'zod';
import { createChildLogger } from '../utils/logger.js';
import {
  BandwidthSampleSchema,
  DiscoveryRecordSchema,
  LeaseRecordSchema,
  NetworkMetricsSampleSchema,
  WifiNetworkObservationSchema,
  WifiStatsSchema,
  type BandwidthSample,
  type DiscoveryRecord,
  type LeaseRecord,
  type NetworkMetricsSample,
  type WifiNetworkObservation,
  type WifiStats,
} from '../types/network.js';

const logger = createChildLogger('snapshot-normalizer');

export const EMPTY_BANDWIDTH: Readonly<BandwidthSample> = Object.freeze({ inMbps: 0, outMbps: 0 });

export const EMPTY_WIFI_STATS: Readonly<WifiStats> = Object.freeze({
  band2gClients: 0,
  band5gClients: 0,
  totalClients: 0,
  accessPoints: [],
});

export const EMPTY_METRICS: Readonly<NetworkMetricsSample> = Object.freeze({
  packetLossPercent: 0,
  avgLatencyMs: 0,
  maxLatencyMs: 0,
  jitterMs: 0,
  tcpRetries: 0,
  udpErrors: 0,
});

export type PayloadSource = 'discovery' | 'leases' | 'bandwidth' | 'wifiStats' | 'metrics' | 'wifiObservations';

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function toCamelCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_match, next: string) => next.toUpperCase());
}

/**
 * Collectors report `last_seen`, `packet_loss_percent`, `band_2g_clients` and
 * the like; the schemas use camelCase. A camelCase key wins when both spellings
 * are present.
 */
export function camelizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(camelizeKeys);
  if (!isPlainRecord(value)) return value;

  const result: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    const camel = toCamelCase(key);
    if (camel !== key && Object.hasOwn(value, camel)) continue;
    result[camel] = camelizeKeys(item);
  }
  return result;
}

/**
 * Keeps every element that parses and drops the rest, so a partly broken
 * payload still yields what it can.
 */
function parseList<S extends z.ZodTypeAny>(source: string, schema: S, raw: unknown): Array<z.output<S>> {
  if (!Array.isArray(raw)) {
    if (raw !== undefined && raw !== null) {
      logger.warn({ source, received: typeof raw }, 'Expected a list, treating as empty');
    }
    return [];
  }

  const parsed: Array<z.output<S>> = [];
  let dropped = 0;
  for (const item of raw) {
    const result = schema.safeParse(camelizeKeys(item));
    if (result.success) {
      parsed.push(result.data);
    } else {
      dropped++;
    }
  }

  if (dropped > 0) {
    logger.warn({ source, dropped, kept: parsed.length }, 'Dropped malformed records');
  }
  return parsed;
}

function parseRecord<S extends z.ZodTypeAny>(source: string, schema: S, raw: unknown, fallback: z.output<S>): z.output<S> {
  if (raw === undefined || raw === null) return fallback;
  const result = schema.safeParse(camelizeKeys(raw));
  if (result.success) return result.data;
  logger.warn({ source, issues: result.error.issues.length }, 'Malformed payload, using defaults');
  return fallback;
}

export function normalizeDiscovery(raw: unknown): DiscoveryRecord[] {
  return parseList('discovery', DiscoveryRecordSchema, raw);
}

export function normalizeLeases(raw: unknown): LeaseRecord[] {
  return parseList('leases', LeaseRecordSchema, raw);
}

export function normalizeBandwidth(raw: unknown): BandwidthSample {
  return parseRecord('bandwidth', BandwidthSampleSchema, raw, { ...EMPTY_BANDWIDTH });
}

export function normalizeWifiStats(raw: unknown): WifiStats {
  const stats = parseRecord('wifiStats', WifiStatsSchema, raw, { ...EMPTY_WIFI_STATS, accessPoints: [] });
  // Some collectors only report per-band counts
  if (stats.totalClients === 0 && stats.band2gClients + stats.band5gClients > 0) {
    return { ...stats, totalClients: stats.band2gClients + stats.band5gClients };
  }
  return stats;
}

export function normalizeMetrics(raw: unknown): NetworkMetricsSample {
  return parseRecord('metrics', NetworkMetricsSampleSchema, raw, { ...EMPTY_METRICS });
}

export function normalizeObservations(raw: unknown): WifiNetworkObservation[] {
  return parseList('wifiObservations', WifiNetworkObservationSchema, raw);
}

const RECORD_FIELDS = {
  bandwidth: Object.keys(BandwidthSampleSchema.shape),
  wifiStats: Object.keys(WifiStatsSchema.shape),
  metrics: Object.keys(NetworkMetricsSampleSchema.shape),
} as const;

const LIST_SCHEMAS = {
  discovery: DiscoveryRecordSchema,
  leases: LeaseRecordSchema,
  wifiObservations: WifiNetworkObservationSchema,
} as const;

/**
 * True when a payload arrived but nothing in it matches the source's schema:
 * a record without a single known field, or a non-empty list none of whose
 * elements parse. An absent payload or an empty list is not flagged.
 */
export function isUnrecognizedPayload(source: PayloadSource, raw: unknown): boolean {
  if (raw === undefined || raw === null) return false;

  switch (source) {
    case 'bandwidth':
    case 'wifiStats':
    case 'metrics': {
      const doc = camelizeKeys(raw);
      if (!isPlainRecord(doc)) return true;
      return !RECORD_FIELDS[source].some(field => doc[field] !== undefined);
    }
    case 'discovery':
    case 'leases':
    case 'wifiObservations': {
      if (!Array.isArray(raw)) return true;
      const schema = LIST_SCHEMAS[source];
      return raw.length > 0 && !raw.some(item => schema.safeParse(camelizeKeys(item)).success);
    }
  }
}
