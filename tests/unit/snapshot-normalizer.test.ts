import { describe, it, expect } from 'vitest';
import {
  EMPTY_BANDWIDTH,
  EMPTY_METRICS,
  camelizeKeys,
  isUnrecognizedPayload,
  normalizeBandwidth,
  normalizeDiscovery,
  normalizeLeases,
  normalizeMetrics,
  normalizeObservations,
  normalizeWifiStats,
} from '../../src/infra/snapshot-normalizer.js';

describe('normalizeDiscovery', () => {
  it('should drop records without an IP and default the rest', () => {
    const records = normalizeDiscovery([
      { ip: ' 10.0.0.1 ', mac: 5, lastSeen: 'garbage' },
      { ip: '' },
      { mac: 'aa:bb:cc:dd:ee:ff' },
      { ip: '10.0.0.2', mac: 'aa:bb:cc:dd:ee:ff', lastSeen: 1700000000000 },
    ]);
    expect(records).toEqual([
      { ip: '10.0.0.1', mac: '', lastSeen: null },
      { ip: '10.0.0.2', mac: 'aa:bb:cc:dd:ee:ff', lastSeen: new Date(1700000000000) },
    ]);
  });

  it('should treat a non-list payload as empty', () => {
    expect(normalizeDiscovery('not a list')).toEqual([]);
    expect(normalizeDiscovery(undefined)).toEqual([]);
  });
});

describe('normalizeLeases', () => {
  it('should parse expiry timestamps and drop unreadable ones', () => {
    const leases = normalizeLeases([
      { ip: '10.0.0.1', hostname: 'nas', expiresAt: '2026-01-01T00:00:00.000Z' },
      { ip: '10.0.0.2', hostname: 42, expiresAt: 'soon' },
    ]);
    expect(leases).toEqual([
      { ip: '10.0.0.1', hostname: 'nas', expiresAt: new Date('2026-01-01T00:00:00.000Z') },
      { ip: '10.0.0.2' },
    ]);
  });
});

describe('normalizeBandwidth', () => {
  it('should zero negative or non-numeric rates', () => {
    expect(normalizeBandwidth({ inMbps: -3, outMbps: 'x' })).toEqual({ inMbps: 0, outMbps: 0 });
    expect(normalizeBandwidth({ inMbps: 8.5, outMbps: 1 })).toEqual({ inMbps: 8.5, outMbps: 1 });
  });

  it('should use defaults for a missing or malformed payload', () => {
    expect(normalizeBandwidth(undefined)).toEqual(EMPTY_BANDWIDTH);
    expect(normalizeBandwidth('fast')).toEqual(EMPTY_BANDWIDTH);
  });
});

describe('normalizeWifiStats', () => {
  it('should derive the total from per-band counts when missing', () => {
    expect(normalizeWifiStats({ band2gClients: 3, band5gClients: 2 })).toEqual({
      band2gClients: 3,
      band5gClients: 2,
      totalClients: 5,
      accessPoints: [],
    });
  });

  it('should keep a reported total', () => {
    expect(normalizeWifiStats({ band2gClients: 3, totalClients: 7 }).totalClients).toBe(7);
  });

  it('should default malformed access point fields', () => {
    const stats = normalizeWifiStats({ accessPoints: [{ name: 'hall', clients: -1 }] });
    expect(stats.accessPoints).toEqual([{ name: 'hall', band: '', clients: 0, channel: 0 }]);
  });
});

describe('normalizeMetrics', () => {
  it('should reject out-of-range packet loss', () => {
    expect(normalizeMetrics({ packetLossPercent: 150, avgLatencyMs: 20 })).toEqual({
      ...EMPTY_METRICS,
      avgLatencyMs: 20,
    });
  });

  it('should use defaults when absent', () => {
    expect(normalizeMetrics(null)).toEqual(EMPTY_METRICS);
  });
});

describe('normalizeObservations', () => {
  it('should keep only complete observations', () => {
    const valid = {
      ssid: 'Lab',
      bssid: '00:11:22:33:44:55',
      signalDbm: -60,
      signalPercent: 57,
      channel: 6,
      frequency: 2437,
      band: '2.4GHz',
      security: 'WPA2',
      hidden: false,
    };
    expect(normalizeObservations([valid, { ...valid, band: '900MHz' }])).toEqual([valid]);
  });
});

describe('camelizeKeys', () => {
  it('should convert nested snake_case keys and keep camelCase ones', () => {
    expect(camelizeKeys({
      last_seen: 1,
      lastSeen: 2,
      band_2g_clients: 3,
      access_points: [{ signal_dbm: -40 }],
    })).toEqual({
      lastSeen: 2,
      band2gClients: 3,
      accessPoints: [{ signalDbm: -40 }],
    });
  });

  it('should leave dates and primitives alone', () => {
    const seen = new Date('2026-01-15T12:00:00.000Z');
    expect(camelizeKeys({ seen_at: seen })).toEqual({ seenAt: seen });
    expect(camelizeKeys('in_mbps')).toBe('in_mbps');
  });
});

describe('snake_case payloads', () => {
  it('should map collector field names onto the parsed types', () => {
    expect(normalizeDiscovery([{ ip: '10.0.0.5', mac: 'aa:bb:cc:dd:ee:ff', last_seen: 1700000000000 }])).toEqual([
      { ip: '10.0.0.5', mac: 'aa:bb:cc:dd:ee:ff', lastSeen: new Date(1700000000000) },
    ]);
    expect(normalizeBandwidth({ in_mbps: 40, out_mbps: 8 })).toEqual({ inMbps: 40, outMbps: 8 });
    expect(normalizeWifiStats({ band_2g_clients: 3, band_5g_clients: 2 })).toEqual({
      band2gClients: 3,
      band5gClients: 2,
      totalClients: 5,
      accessPoints: [],
    });
    expect(normalizeMetrics({ packet_loss_percent: 6, avg_latency_ms: 600 })).toEqual({
      ...EMPTY_METRICS,
      packetLossPercent: 6,
      avgLatencyMs: 600,
    });
  });
});

describe('isUnrecognizedPayload', () => {
  it('should flag records without a single known field', () => {
    expect(isUnrecognizedPayload('bandwidth', { rx_rate: 5 })).toBe(true);
    expect(isUnrecognizedPayload('metrics', {})).toBe(true);
    expect(isUnrecognizedPayload('wifiStats', 'busy')).toBe(true);
    expect(isUnrecognizedPayload('bandwidth', { in_mbps: -1 })).toBe(false);
    expect(isUnrecognizedPayload('metrics', { packetLossPercent: 2 })).toBe(false);
  });

  it('should flag lists none of whose elements parse', () => {
    expect(isUnrecognizedPayload('discovery', [{ address: '10.0.0.9' }])).toBe(true);
    expect(isUnrecognizedPayload('leases', 'none')).toBe(true);
    expect(isUnrecognizedPayload('discovery', [{ ip: '10.0.0.1' }, { address: '10.0.0.9' }])).toBe(false);
    expect(isUnrecognizedPayload('wifiObservations', [])).toBe(false);
  });

  it('should not flag an absent payload', () => {
    expect(isUnrecognizedPayload('bandwidth', undefined)).toBe(false);
    expect(isUnrecognizedPayload('discovery', null)).toBe(false);
  });
});
