import { z } from 'zod';

export const WifiBandSchema = z.enum(['2.4GHz', '5GHz', '6GHz']);
export type WifiBand = z.infer<typeof WifiBandSchema>;

export const DeviceStatusSchema = z.enum(['online', 'offline', 'unknown']);
export type DeviceStatus = z.infer<typeof DeviceStatusSchema>;

export const DeviceSourceSchema = z.enum(['discovery']);
export type DeviceSource = z.infer<typeof DeviceSourceSchema>;

export const DeviceSchema = z.object({
  ip: z.string(),
  mac: z.string(),
  source: DeviceSourceSchema,
  status: DeviceStatusSchema,
  lastSeen: z.date().nullable(),
  hostname: z.string().optional(),
});
export type Device = z.infer<typeof DeviceSchema>;

/** Accepts a Date, an ISO string or epoch milliseconds. */
export const TimestampSchema = z.preprocess(
  (value) => (typeof value === 'string' || typeof value === 'number' ? new Date(value) : value),
  z.date()
);

export const DiscoveryRecordSchema = z.object({
  ip: z.string().trim().min(1),
  mac: z.string().catch(''),
  lastSeen: TimestampSchema.nullable().catch(null),
});
export type DiscoveryRecord = z.infer<typeof DiscoveryRecordSchema>;

export const LeaseRecordSchema = z.object({
  ip: z.string().trim().min(1),
  mac: z.string().optional().catch(undefined),
  hostname: z.string().optional().catch(undefined),
  expiresAt: TimestampSchema.optional().catch(undefined),
});
export type LeaseRecord = z.infer<typeof LeaseRecordSchema>;

export interface LeaseStats {
  total: number;
  active: number;
  expired: number;
}

export const BandwidthSampleSchema = z.object({
  inMbps: z.number().nonnegative().catch(0),
  outMbps: z.number().nonnegative().catch(0),
});
export type BandwidthSample = z.infer<typeof BandwidthSampleSchema>;

export const AccessPointSchema = z.object({
  name: z.string().catch(''),
  band: z.string().catch(''),
  clients: z.number().int().nonnegative().catch(0),
  channel: z.number().int().nonnegative().catch(0),
});
export type AccessPoint = z.infer<typeof AccessPointSchema>;

export const WifiStatsSchema = z.object({
  band2gClients: z.number().int().nonnegative().catch(0),
  band5gClients: z.number().int().nonnegative().catch(0),
  totalClients: z.number().int().nonnegative().catch(0),
  accessPoints: z.array(AccessPointSchema).catch([]),
});
export type WifiStats = z.infer<typeof WifiStatsSchema>;

export const NetworkMetricsSampleSchema = z.object({
  packetLossPercent: z.number().min(0).max(100).catch(0),
  avgLatencyMs: z.number().nonnegative().catch(0),
  maxLatencyMs: z.number().nonnegative().catch(0),
  jitterMs: z.number().nonnegative().catch(0),
  tcpRetries: z.number().int().nonnegative().catch(0),
  udpErrors: z.number().int().nonnegative().catch(0),
});
export type NetworkMetricsSample = z.infer<typeof NetworkMetricsSampleSchema>;

export const WifiNetworkObservationSchema = z.object({
  ssid: z.string(),
  bssid: z.string(),
  signalDbm: z.number(),
  signalPercent: z.number().min(0).max(100),
  channel: z.number().int().nonnegative(),
  frequency: z.number().nonnegative(),
  band: WifiBandSchema,
  security: z.string(),
  hidden: z.boolean(),
});
export type WifiNetworkObservation = z.infer<typeof WifiNetworkObservationSchema>;
