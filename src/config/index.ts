import { z } from 'zod';
import { createChildLogger } from '../utils/logger.js';
import { ConfigurationError, ErrorCode } from '../utils/errors.js';
import { MAX_TIMER_DELAY_MS } from '../utils/async-helpers.js';

const logger = createChildLogger('config');

export const DEFAULT_THRESHOLDS = {
  offlineThresholdMinutes: 30,
  packetLossWarning: 1.0,
  packetLossCritical: 5.0,
  latencyWarningMs: 100,
  latencyCriticalMs: 500,
  wifiClientLimit: 100,
} as const;

// Each threshold falls back to its documented default on malformed input
export const AnalysisThresholdsSchema = z.object({
  offlineThresholdMinutes: z.number().positive().finite().catch(DEFAULT_THRESHOLDS.offlineThresholdMinutes),
  packetLossWarning: z.number().min(0).max(100).catch(DEFAULT_THRESHOLDS.packetLossWarning),
  packetLossCritical: z.number().min(0).max(100).catch(DEFAULT_THRESHOLDS.packetLossCritical),
  latencyWarningMs: z.number().nonnegative().finite().catch(DEFAULT_THRESHOLDS.latencyWarningMs),
  latencyCriticalMs: z.number().nonnegative().finite().catch(DEFAULT_THRESHOLDS.latencyCriticalMs),
  wifiClientLimit: z.number().int().nonnegative().catch(DEFAULT_THRESHOLDS.wifiClientLimit),
});
export type AnalysisThresholds = z.infer<typeof AnalysisThresholdsSchema>;

export const ConfigSchema = z.object({
  analysis: AnalysisThresholdsSchema.extend({
    cycleIntervalSeconds: z.number().int().positive().max(Math.floor(MAX_TIMER_DELAY_MS / 1000)).catch(300),
  }).default({}),
  history: z.object({
    capacity: z.number().int().positive().catch(288),
    defaultTrendHours: z.number().positive().catch(24),
  }).default({}),
  issues: z.object({
    repeatPolicy: z.enum(['repeat', 'suppress']).catch('repeat'),
    suppressWindowMinutes: z.number().positive().catch(60),
  }).default({}),
  sources: z.object({
    timeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).catch(10000),
  }).default({}),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).catch('info'),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

/**
 * A warning threshold above its critical partner makes the critical band
 * unreachable, so both reset to defaults.
 */
function enforceThresholdOrder(analysis: Config['analysis']): Config['analysis'] {
  const result = { ...analysis };

  if (result.packetLossWarning > result.packetLossCritical) {
    const err = new ConfigurationError('packetLossWarning exceeds packetLossCritical', {
      code: ErrorCode.CONFIG_THRESHOLD_ORDER,
      context: { warning: result.packetLossWarning, critical: result.packetLossCritical },
    });
    logger.warn({ err: err.toJSON() }, 'Packet loss thresholds out of order, using defaults');
    result.packetLossWarning = DEFAULT_THRESHOLDS.packetLossWarning;
    result.packetLossCritical = DEFAULT_THRESHOLDS.packetLossCritical;
  }

  if (result.latencyWarningMs > result.latencyCriticalMs) {
    const err = new ConfigurationError('latencyWarningMs exceeds latencyCriticalMs', {
      code: ErrorCode.CONFIG_THRESHOLD_ORDER,
      context: { warning: result.latencyWarningMs, critical: result.latencyCriticalMs },
    });
    logger.warn({ err: err.toJSON() }, 'Latency thresholds out of order, using defaults');
    result.latencyWarningMs = DEFAULT_THRESHOLDS.latencyWarningMs;
    result.latencyCriticalMs = DEFAULT_THRESHOLDS.latencyCriticalMs;
  }

  return result;
}

export function resolveConfig(input: unknown = {}): Config {
  const parsed = ConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    logger.warn({ issues: parsed.error.issues }, 'Configuration unreadable, using defaults');
    const fallback = ConfigSchema.parse({});
    return { ...fallback, analysis: enforceThresholdOrder(fallback.analysis) };
  }
  return { ...parsed.data, analysis: enforceThresholdOrder(parsed.data.analysis) };
}

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

export function loadConfigFromEnv(): Config {
  return resolveConfig({
    analysis: {
      offlineThresholdMinutes: envNumber('LANWATCH_OFFLINE_THRESHOLD_MINUTES'),
      packetLossWarning: envNumber('LANWATCH_PACKET_LOSS_WARNING'),
      packetLossCritical: envNumber('LANWATCH_PACKET_LOSS_CRITICAL'),
      latencyWarningMs: envNumber('LANWATCH_LATENCY_WARNING_MS'),
      latencyCriticalMs: envNumber('LANWATCH_LATENCY_CRITICAL_MS'),
      wifiClientLimit: envNumber('LANWATCH_WIFI_CLIENT_LIMIT'),
      cycleIntervalSeconds: envNumber('LANWATCH_CYCLE_INTERVAL_SECONDS'),
    },
    history: {
      capacity: envNumber('LANWATCH_HISTORY_CAPACITY'),
      defaultTrendHours: envNumber('LANWATCH_TREND_HOURS'),
    },
    issues: {
      repeatPolicy: process.env['LANWATCH_ISSUE_REPEAT_POLICY'],
      suppressWindowMinutes: envNumber('LANWATCH_ISSUE_SUPPRESS_WINDOW_MINUTES'),
    },
    sources: {
      timeoutMs: envNumber('LANWATCH_SOURCE_TIMEOUT_MS'),
    },
    logging: {
      level: process.env['LOG_LEVEL'],
    },
  });
}
