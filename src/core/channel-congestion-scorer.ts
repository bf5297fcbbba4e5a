import { channelFrequencyOrZero, clamp } from '../utils/frequency.js';
import type { WifiBand, WifiNetworkObservation } from '../types/network.js';
import type {
  ChannelRecommendation,
  ChannelStat,
  OverlapGroup,
} from '../types/analysis.js';

const SIGNAL_FLOOR_DBM = -90;
const SIGNAL_SPAN_DB = 60;
const SATURATING_NETWORK_COUNT = 5;
const SIGNAL_WEIGHT = 0.7;
const COUNT_WEIGHT = 0.3;

const CONGESTED_PERCENT = 70;
const BUSY_PERCENT = 40;
const OVERLAP_SOURCE_PERCENT = 60;
const OVERLAP_NEIGHBOR_PERCENT = 40;
const OVERLAP_DISTANCE = 2;
const MAX_OVERLAP_GROUPS = 3;

export class ChannelCongestionScorer {
  score(
    channel: number,
    band: WifiBand,
    observations: readonly WifiNetworkObservation[]
  ): ChannelStat {
    const usable = observations.filter(o => Number.isFinite(o.signalDbm));

    return {
      channel,
      band,
      frequency: channelFrequencyOrZero(channel, band),
      utilizationPercent: this.utilization(usable),
      networksCount: observations.length,
      observations: [...observations],
    };
  }

  private utilization(observations: readonly WifiNetworkObservation[]): number {
    if (observations.length === 0) return 0;

    const avgSignal = observations.reduce((sum, o) => sum + o.signalDbm, 0) / observations.length;
    const signalWeight = clamp((avgSignal - SIGNAL_FLOOR_DBM) / SIGNAL_SPAN_DB, 0, 1);
    const countWeight = clamp(observations.length / SATURATING_NETWORK_COUNT, 0, 1);

    return clamp(
      Math.round(100 * (SIGNAL_WEIGHT * signalWeight + COUNT_WEIGHT * countWeight)),
      0,
      100
    );
  }

  // Ties go to the lower channel number
  recommend(band: WifiBand, stats: readonly ChannelStat[]): ChannelRecommendation | null {
    let best: ChannelStat | undefined;
    for (const stat of stats) {
      if (
        best === undefined ||
        stat.utilizationPercent < best.utilizationPercent ||
        (stat.utilizationPercent === best.utilizationPercent && stat.channel < best.channel)
      ) {
        best = stat;
      }
    }
    if (best === undefined) return null;

    const base = { band, bestChannel: best.channel, bestUtilization: best.utilizationPercent };

    if (best.utilizationPercent > CONGESTED_PERCENT) {
      const message = band === '2.4GHz'
        ? `2.4GHz band is heavily congested (best channel ${best.channel} at ${best.utilizationPercent}%), move clients to 5GHz`
        : `${band} band is congested, least busy channel is ${best.channel} (${best.utilizationPercent}%)`;
      return { ...base, level: 'warning', message };
    }

    if (best.utilizationPercent > BUSY_PERCENT) {
      return {
        ...base,
        level: 'info',
        message: `${band} recommended channel: ${best.channel} (${best.utilizationPercent}% utilization)`,
      };
    }

    return {
      ...base,
      level: 'ok',
      message: `${band} channel ${best.channel} is clear (${best.utilizationPercent}% utilization)`,
    };
  }

  findOverlapGroups(stats: readonly ChannelStat[]): OverlapGroup[] {
    const groups: OverlapGroup[] = [];

    for (const stat of stats) {
      if (stat.band !== '2.4GHz' || stat.utilizationPercent <= OVERLAP_SOURCE_PERCENT) continue;

      const neighbors = stats
        .filter(other =>
          other.band === '2.4GHz' &&
          other.channel !== stat.channel &&
          Math.abs(other.channel - stat.channel) <= OVERLAP_DISTANCE &&
          other.utilizationPercent > OVERLAP_NEIGHBOR_PERCENT
        )
        .map(other => other.channel)
        .sort((a, b) => a - b);

      if (neighbors.length > 0) {
        groups.push({
          channel: stat.channel,
          utilizationPercent: stat.utilizationPercent,
          neighbors,
        });
      }
    }

    return groups
      .sort((a, b) => b.utilizationPercent - a.utilizationPercent || a.channel - b.channel)
      .slice(0, MAX_OVERLAP_GROUPS);
  }
}
