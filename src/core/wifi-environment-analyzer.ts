import { createChildLogger } from '../utils/logger.js';
import { channelPlan } from '../utils/frequency.js';
import { ChannelCongestionScorer } from './channel-congestion-scorer.js';
import type { WifiBand, WifiNetworkObservation } from '../types/network.js';
import type {
  ChannelRecommendation,
  ChannelStat,
  OverlapGroup,
} from '../types/analysis.js';

const logger = createChildLogger('wifi-environment-analyzer');

const ANALYZED_BANDS: readonly WifiBand[] = ['2.4GHz', '5GHz', '6GHz'];
const SUMMARY_NETWORK_LIMIT = 20;

export interface WifiEnvironmentReport {
  timestamp: Date;
  networks: WifiNetworkObservation[];
  channels: Record<WifiBand, ChannelStat[]>;
  recommendations: ChannelRecommendation[];
  overlapGroups: OverlapGroup[];
  hiddenNetworks: number;
  messages: string[];
}

export interface WifiEnvironmentSummary {
  timestamp: Date;
  networksCount: number;
  bestChannel2g: number | null;
  bestChannel5g: number | null;
  messages: string[];
  networks: Array<Pick<WifiNetworkObservation, 'ssid' | 'bssid' | 'signalDbm' | 'channel' | 'band' | 'security'>>;
}

export class WifiEnvironmentAnalyzer {
  private readonly scorer: ChannelCongestionScorer;

  constructor(scorer: ChannelCongestionScorer = new ChannelCongestionScorer()) {
    this.scorer = scorer;
  }

  analyze(observations: readonly WifiNetworkObservation[], now: Date = new Date()): WifiEnvironmentReport {
    const channels: Record<WifiBand, ChannelStat[]> = {
      '2.4GHz': this.analyzeBand('2.4GHz', observations),
      '5GHz': this.analyzeBand('5GHz', observations),
      '6GHz': this.analyzeBand('6GHz', observations),
    };

    const recommendations: ChannelRecommendation[] = [];
    for (const band of ANALYZED_BANDS) {
      const recommendation = this.scorer.recommend(band, channels[band]);
      if (recommendation) recommendations.push(recommendation);
    }

    const overlapGroups = this.scorer.findOverlapGroups(channels['2.4GHz']);
    const hiddenNetworks = observations.filter(o => o.hidden).length;

    const messages = recommendations
      .filter(r => r.level !== 'ok')
      .map(r => r.message);
    if (hiddenNetworks > 0) {
      messages.push(`${hiddenNetworks} hidden network(s) detected`);
    }
    if (overlapGroups.length > 0) {
      const described = overlapGroups.map(g => `${g.channel} overlaps ${g.neighbors.join('/')}`);
      messages.push(`Channel overlap detected: ${described.join(', ')}`);
    }
    if (messages.length === 0) {
      messages.push('Wifi environment is clean, no significant issues');
    }

    logger.info({
      networks: observations.length,
      hiddenNetworks,
      overlapGroups: overlapGroups.length,
    }, 'Wifi environment analyzed');

    return {
      timestamp: now,
      networks: [...observations],
      channels,
      recommendations,
      overlapGroups,
      hiddenNetworks,
      messages,
    };
  }

  // Observed channels outside the band plan (14, 6GHz) are appended
  analyzeBand(band: WifiBand, observations: readonly WifiNetworkObservation[]): ChannelStat[] {
    const onBand = observations.filter(o => o.band === band);
    const channelSet = new Set<number>(channelPlan(band));
    for (const observation of onBand) {
      if (observation.channel > 0) channelSet.add(observation.channel);
    }

    return Array.from(channelSet)
      .sort((a, b) => a - b)
      .map(channel => this.scorer.score(
        channel,
        band,
        onBand.filter(o => o.channel === channel)
      ));
  }

  summarize(report: WifiEnvironmentReport): WifiEnvironmentSummary {
    const best = (band: WifiBand): number | null =>
      report.recommendations.find(r => r.band === band)?.bestChannel ?? null;

    return {
      timestamp: report.timestamp,
      networksCount: report.networks.length,
      bestChannel2g: best('2.4GHz'),
      bestChannel5g: best('5GHz'),
      messages: report.messages,
      networks: strongestFirst(report.networks)
        .slice(0, SUMMARY_NETWORK_LIMIT)
        .map(n => ({
          ssid: n.ssid === '' ? '(hidden)' : n.ssid,
          bssid: n.bssid,
          signalDbm: n.signalDbm,
          channel: n.channel,
          band: n.band,
          security: n.security,
        })),
    };
  }

  neighbors(observations: readonly WifiNetworkObservation[]): WifiNetworkObservation[] {
    return strongestFirst(observations.filter(o => !o.hidden && o.ssid !== ''));
  }
}

function strongestFirst(observations: readonly WifiNetworkObservation[]): WifiNetworkObservation[] {
  return [...observations].sort((a, b) => b.signalDbm - a.signalDbm);
}
