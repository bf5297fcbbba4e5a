import { z } from 'zod';
import { WifiBandSchema, WifiNetworkObservationSchema } from './network.js';

export const SeverityLevelSchema = z.enum(['info', 'warning', 'critical']);
export type SeverityLevel = z.infer<typeof SeverityLevelSchema>;

export const IssueTypeSchema = z.enum([
  'device_offline',
  'packet_loss',
  'latency',
  'wifi_congestion',
  'healthy',
  'ongoing',
]);
export type IssueType = z.infer<typeof IssueTypeSchema>;

/**
 * Stable keys; callers map them to their own wording.
 */
export const RecommendationKeySchema = z.enum([
  'check_device_power_and_link',
  'check_congestion_or_cabling',
  'monitor_load_trend',
  'check_congestion_or_device_load',
  'keep_monitoring',
  'add_access_point_or_balance_load',
  'no_action_needed',
  'review_ongoing_issues',
]);
export type RecommendationKey = z.infer<typeof RecommendationKeySchema>;

export const IssueSchema = z.object({
  severity: SeverityLevelSchema,
  type: IssueTypeSchema,
  title: z.string(),
  description: z.string(),
  recommendation: RecommendationKeySchema,
  details: z.record(z.unknown()).optional(),
});
export type Issue = z.infer<typeof IssueSchema>;

export const HealthSummarySchema = z.object({
  timestamp: z.date(),
  totalDevices: z.number(),
  onlineDevices: z.number(),
  offlineDevices: z.number(),
  unknownDevices: z.number(),
  offlineList: z.array(z.string()),
  packetLoss: z.number(),
  avgLatencyMs: z.number(),
  wifiClients: z.number(),
  bandwidthInMbps: z.number(),
  bandwidthOutMbps: z.number(),
  alerts: z.array(z.string()),
});
export type HealthSummary = z.infer<typeof HealthSummarySchema>;

export type HistoryEntry = Readonly<Omit<HealthSummary, 'offlineList' | 'alerts'>> & {
  readonly offlineList: readonly string[];
  readonly alerts: readonly string[];
};

export const TrendDirectionSchema = z.enum(['increasing', 'stable', 'decreasing']);
export type TrendDirection = z.infer<typeof TrendDirectionSchema>;

export type TrendMetric =
  | 'packetLoss'
  | 'avgLatencyMs'
  | 'wifiClients'
  | 'bandwidthInMbps'
  | 'bandwidthOutMbps';

export interface MetricTrend {
  avg: number;
  max: number;
  min: number;
  trend: TrendDirection;
}

export type TrendReport =
  | {
      status: 'ok';
      periodHours: number;
      dataPoints: number;
      metrics: Record<TrendMetric, MetricTrend>;
    }
  | {
      status: 'no_data';
      periodHours: number;
      message: string;
    };

export const ChannelStatSchema = z.object({
  channel: z.number().int(),
  band: WifiBandSchema,
  frequency: z.number(),
  utilizationPercent: z.number().int().min(0).max(100),
  networksCount: z.number().int().nonnegative(),
  observations: z.array(WifiNetworkObservationSchema),
});
export type ChannelStat = z.infer<typeof ChannelStatSchema>;

export type RecommendationLevel = 'warning' | 'info' | 'ok';

export interface ChannelRecommendation {
  band: z.infer<typeof WifiBandSchema>;
  level: RecommendationLevel;
  bestChannel: number;
  bestUtilization: number;
  message: string;
}

export interface OverlapGroup {
  channel: number;
  utilizationPercent: number;
  neighbors: number[];
}
