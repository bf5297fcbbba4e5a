import { createChildLogger } from '../utils/logger.js';
import { normalizeMac } from '../utils/mac.js';
import type {
  Device,
  DeviceStatus,
  DiscoveryRecord,
  LeaseRecord,
  LeaseStats,
} from '../types/network.js';

const logger = createChildLogger('device-registry');

export interface RosterCounts {
  total: number;
  online: number;
  offline: number;
  unknown: number;
}

export interface RosterSnapshot extends RosterCounts {
  devices: Device[];
}

export class DeviceRoster {
  private readonly byIp: ReadonlyMap<string, Device>;
  private readonly byMac: ReadonlyMap<string, Device>;

  constructor(devices: Iterable<Device> = []) {
    const byIp = new Map<string, Device>();
    for (const device of devices) {
      byIp.set(device.ip, Object.freeze({ ...device }));
    }

    // Secondary index only; IP stays the identity key
    const byMac = new Map<string, Device>();
    for (const device of byIp.values()) {
      if (device.mac !== '' && !byMac.has(device.mac)) {
        byMac.set(device.mac, device);
      }
    }

    this.byIp = byIp;
    this.byMac = byMac;
  }

  static empty(): DeviceRoster {
    return new DeviceRoster();
  }

  get size(): number {
    return this.byIp.size;
  }

  get(ip: string): Device | undefined {
    return this.byIp.get(ip);
  }

  has(ip: string): boolean {
    return this.byIp.has(ip);
  }

  findByMac(mac: string): Device | undefined {
    return this.byMac.get(normalizeMac(mac));
  }

  list(): Device[] {
    return Array.from(this.byIp.values());
  }

  byStatus(status: DeviceStatus): Device[] {
    return this.list().filter(d => d.status === status);
  }

  counts(): RosterCounts {
    const counts: RosterCounts = { total: this.byIp.size, online: 0, offline: 0, unknown: 0 };
    for (const device of this.byIp.values()) {
      counts[device.status]++;
    }
    return counts;
  }

  toJSON(): RosterSnapshot {
    return { ...this.counts(), devices: this.list() };
  }
}

export interface DeviceRegistryOptions {
  offlineThresholdMinutes: number;
}

export class DeviceRegistry {
  private readonly offlineThresholdMs: number;

  constructor(options: DeviceRegistryOptions) {
    this.offlineThresholdMs = options.offlineThresholdMinutes * 60 * 1000;
  }

  get offlineThreshold(): number {
    return this.offlineThresholdMs;
  }

  refresh(
    discoveryRecords: readonly DiscoveryRecord[],
    leaseRecords: readonly LeaseRecord[],
    now: Date = new Date()
  ): DeviceRoster {
    const devices = new Map<string, Device>();

    for (const record of discoveryRecords) {
      const existing = devices.get(record.ip);
      if (existing && !isNewer(record.lastSeen, existing.lastSeen)) {
        continue;
      }
      devices.set(record.ip, {
        ip: record.ip,
        mac: normalizeMac(record.mac),
        source: 'discovery',
        status: 'online',
        lastSeen: record.lastSeen,
      });
    }

    const activeLeases = new Map<string, LeaseRecord>();
    for (const lease of leaseRecords) {
      if (isLeaseActive(lease, now)) {
        activeLeases.set(lease.ip, lease);
      }
    }

    for (const [ip, device] of devices) {
      const lease = activeLeases.get(ip);
      if (!lease) {
        device.status = 'unknown';
      } else if (lease.hostname !== undefined && lease.hostname !== '') {
        device.hostname = lease.hostname;
      }

      if (device.lastSeen !== null && now.getTime() - device.lastSeen.getTime() > this.offlineThresholdMs) {
        device.status = 'offline';
      }
    }

    const roster = new DeviceRoster(devices.values());
    logger.debug({
      ...roster.counts(),
      discoveryRecords: discoveryRecords.length,
      activeLeases: activeLeases.size,
    }, 'Device roster refreshed');
    return roster;
  }

  summarizeLeases(leaseRecords: readonly LeaseRecord[], now: Date = new Date()): LeaseStats {
    let active = 0;
    for (const lease of leaseRecords) {
      if (isLeaseActive(lease, now)) active++;
    }
    return {
      total: leaseRecords.length,
      active,
      expired: leaseRecords.length - active,
    };
  }
}

function isLeaseActive(lease: LeaseRecord, now: Date): boolean {
  return lease.expiresAt === undefined || lease.expiresAt.getTime() > now.getTime();
}

function isNewer(candidate: Date | null, current: Date | null): boolean {
  if (candidate === null) return current === null;
  if (current === null) return true;
  return candidate.getTime() >= current.getTime();
}
