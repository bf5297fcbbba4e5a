import { describe, it, expect } from 'vitest';
import {
  bandFromFrequency,
  channelFrequencyOrZero,
  channelPlan,
  clamp,
  frequencyToChannel,
  rssiToPercent,
  wifiChannelToFrequency,
} from '../../src/utils/frequency.js';

describe('wifiChannelToFrequency', () => {
  it('should map 2.4GHz channels', () => {
    expect(wifiChannelToFrequency(1, '2.4GHz')).toBe(2412);
    expect(wifiChannelToFrequency(6, '2.4GHz')).toBe(2437);
    expect(wifiChannelToFrequency(13, '2.4GHz')).toBe(2472);
    expect(wifiChannelToFrequency(14, '2.4GHz')).toBe(2484);
  });

  it('should map 5GHz and 6GHz channels', () => {
    expect(wifiChannelToFrequency(36, '5GHz')).toBe(5180);
    expect(wifiChannelToFrequency(165, '5GHz')).toBe(5825);
    expect(wifiChannelToFrequency(1, '6GHz')).toBe(5955);
  });

  it('should throw for an invalid 2.4GHz channel', () => {
    expect(() => wifiChannelToFrequency(15, '2.4GHz')).toThrow('Invalid channel 15 for band 2.4GHz');
    expect(channelFrequencyOrZero(15, '2.4GHz')).toBe(0);
  });
});

describe('frequencyToChannel', () => {
  it('should invert the channel mapping', () => {
    expect(frequencyToChannel(2412)).toBe(1);
    expect(frequencyToChannel(2437)).toBe(6);
    expect(frequencyToChannel(2484)).toBe(14);
    expect(frequencyToChannel(5180)).toBe(36);
    expect(frequencyToChannel(5955)).toBe(1);
  });

  it('should return 0 for unknown frequencies', () => {
    expect(frequencyToChannel(2400)).toBe(0);
    expect(frequencyToChannel(2413)).toBe(0);
    expect(frequencyToChannel(0)).toBe(0);
  });
});

describe('bandFromFrequency', () => {
  it('should classify bands', () => {
    expect(bandFromFrequency(2437)).toBe('2.4GHz');
    expect(bandFromFrequency(5180)).toBe('5GHz');
    expect(bandFromFrequency(5955)).toBe('6GHz');
  });
});

describe('channelPlan', () => {
  it('should list the regulatory channels per band', () => {
    expect(channelPlan('2.4GHz')).toHaveLength(13);
    expect(channelPlan('5GHz')).toHaveLength(25);
    expect(channelPlan('6GHz')).toEqual([]);
  });
});

describe('rssiToPercent', () => {
  it('should scale -100..-30 dBm to 0..100', () => {
    expect(rssiToPercent(-100)).toBe(0);
    expect(rssiToPercent(-65)).toBe(50);
    expect(rssiToPercent(-40)).toBe(85);
    expect(rssiToPercent(-30)).toBe(100);
  });

  it('should clamp out-of-range values', () => {
    expect(rssiToPercent(-120)).toBe(0);
    expect(rssiToPercent(-10)).toBe(100);
    expect(rssiToPercent(Number.NaN)).toBe(0);
  });
});

describe('clamp', () => {
  it('should bound a value', () => {
    expect(clamp(5, 0, 1)).toBe(1);
    expect(clamp(-5, 0, 1)).toBe(0);
    expect(clamp(0.5, 0, 1)).toBe(0.5);
  });
});
