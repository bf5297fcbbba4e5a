import * as fs from 'fs/promises';
import { createChildLogger } from '../utils/logger.js';
import { DataUnavailableError, ErrorCode } from '../utils/errors.js';
import {
  camelizeKeys,
  normalizeBandwidth,
  normalizeDiscovery,
  normalizeLeases,
  normalizeMetrics,
  normalizeObservations,
  normalizeWifiStats,
} from './snapshot-normalizer.js';
import { parseScanOutput } from './wifi-scan-parser.js';
import type { NetworkSources, WifiObservationSource } from './sources.js';
import type {
  BandwidthSample,
  DiscoveryRecord,
  LeaseRecord,
  NetworkMetricsSample,
  WifiNetworkObservation,
  WifiStats,
} from '../types/network.js';

const logger = createChildLogger('snapshot-sources');

/** One point-in-time capture of every collaborator payload. */
export interface NetworkSnapshot {
  discovery: DiscoveryRecord[];
  leases: LeaseRecord[];
  bandwidth: BandwidthSample;
  wifiStats: WifiStats;
  metrics: NetworkMetricsSample;
  wifiObservations: WifiNetworkObservation[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Missing or malformed sections become empty defaults. A `scanOutput` string
 * (iwlist or iw text) is parsed when no `wifiObservations` list is given.
 */
export function parseSnapshot(raw: unknown): NetworkSnapshot {
  const camelized = camelizeKeys(raw);
  const doc = isRecord(camelized) ? camelized : {};

  let wifiObservations = normalizeObservations(doc['wifiObservations']);
  const scanOutput = doc['scanOutput'];
  if (wifiObservations.length === 0 && typeof scanOutput === 'string') {
    wifiObservations = parseScanOutput(scanOutput).observations;
  }

  return {
    discovery: normalizeDiscovery(doc['discovery']),
    leases: normalizeLeases(doc['leases']),
    bandwidth: normalizeBandwidth(doc['bandwidth']),
    wifiStats: normalizeWifiStats(doc['wifiStats']),
    metrics: normalizeMetrics(doc['metrics']),
    wifiObservations,
  };
}

export async function loadSnapshotFile(filePath: string): Promise<NetworkSnapshot> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new DataUnavailableError('snapshot', `Cannot read snapshot file ${filePath}`, {
      cause: err instanceof Error ? err : undefined,
      context: { filePath },
    });
  }

  try {
    return parseSnapshot(JSON.parse(text));
  } catch (err) {
    throw new DataUnavailableError('snapshot', `Snapshot file ${filePath} is not valid JSON`, {
      code: ErrorCode.SOURCE_PAYLOAD_INVALID,
      cause: err instanceof Error ? err : undefined,
      context: { filePath },
    });
  }
}

/**
 * Serves a fixed snapshot through the collaborator interfaces.
 */
export function createSnapshotSources(
  snapshot: NetworkSnapshot
): NetworkSources & { wifiObservations: WifiObservationSource } {
  logger.debug({
    discovery: snapshot.discovery.length,
    leases: snapshot.leases.length,
    wifiObservations: snapshot.wifiObservations.length,
  }, 'Snapshot sources created');

  return {
    discovery: { fetchDiscoveryRecords: async () => snapshot.discovery },
    leases: { fetchLeases: async () => snapshot.leases },
    bandwidth: { fetchBandwidth: async () => snapshot.bandwidth },
    wifiStats: { fetchWifiStats: async () => snapshot.wifiStats },
    metrics: { fetchMetrics: async () => snapshot.metrics },
    wifiObservations: { fetchObservations: async () => snapshot.wifiObservations },
  };
}
