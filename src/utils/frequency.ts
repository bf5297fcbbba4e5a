import type { WifiBand } from '../types/network.js';

export const WIFI_2G_CHANNELS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13] as const;
export const WIFI_5G_CHANNELS = [36, 40, 44, 48, 52, 56, 60, 64, 100, 104, 108, 112, 116, 120, 124, 128, 132, 136, 140, 144, 149, 153, 157, 161, 165] as const;

export function channelPlan(band: WifiBand): readonly number[] {
  switch (band) {
    case '2.4GHz':
      return WIFI_2G_CHANNELS;
    case '5GHz':
      return WIFI_5G_CHANNELS;
    case '6GHz':
      return [];
  }
}

export function wifiChannelToFrequency(channel: number, band: WifiBand): number {
  if (band === '2.4GHz') {
    if (channel >= 1 && channel <= 13) {
      return 2412 + (channel - 1) * 5;
    }
    if (channel === 14) {
      return 2484;
    }
  }
  if (band === '5GHz') {
    return 5000 + channel * 5;
  }
  if (band === '6GHz') {
    return 5950 + channel * 5;
  }
  throw new Error(`Invalid channel ${channel} for band ${band}`);
}

export function channelFrequencyOrZero(channel: number, band: WifiBand): number {
  try {
    return wifiChannelToFrequency(channel, band);
  } catch {
    return 0;
  }
}

/** Returns 0 when the frequency maps to no known channel. */
export function frequencyToChannel(frequencyMhz: number): number {
  if (frequencyMhz === 2484) return 14;
  if (frequencyMhz >= 2412 && frequencyMhz <= 2472 && (frequencyMhz - 2412) % 5 === 0) {
    return (frequencyMhz - 2412) / 5 + 1;
  }
  if (frequencyMhz > 5950 && frequencyMhz <= 7125) {
    return Math.floor((frequencyMhz - 5950) / 5);
  }
  if (frequencyMhz > 5000 && frequencyMhz < 5950) {
    return Math.floor((frequencyMhz - 5000) / 5);
  }
  return 0;
}

export function bandFromFrequency(frequencyMhz: number): WifiBand {
  if (frequencyMhz < 3000) return '2.4GHz';
  if (frequencyMhz < 5950) return '5GHz';
  return '6GHz';
}

/** -100 dBm maps to 0 %, -30 dBm and above to 100 %. */
export function rssiToPercent(rssi: number): number {
  if (!Number.isFinite(rssi)) return 0;
  return Math.max(0, Math.min(100, Math.floor(((rssi + 100) * 100) / 70)));
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
