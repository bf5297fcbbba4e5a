import { createChildLogger } from '../utils/logger.js';
import {
  bandFromFrequency,
  channelFrequencyOrZero,
  frequencyToChannel,
  rssiToPercent,
} from '../utils/frequency.js';
import { normalizeMac } from '../utils/mac.js';
import type { WifiBand, WifiNetworkObservation } from '../types/network.js';

const logger = createChildLogger('wifi-scan-parser');

export type ScanOutputFormat = 'iwlist' | 'iw';

export interface ScanParseResult {
  format: ScanOutputFormat | 'unknown';
  observations: WifiNetworkObservation[];
  /** Blocks that had a BSSID but no usable channel or frequency. */
  skipped: number;
}

interface PartialNetwork {
  bssid: string;
  ssid?: string;
  signalDbm?: number;
  channel?: number;
  frequency?: number;
  security?: string;
  privacy?: boolean;
}

const NO_SIGNAL_DBM = -100;

export function detectScanFormat(output: string): ScanOutputFormat | 'unknown' {
  if (/Cell \d+ - Address:/.test(output)) return 'iwlist';
  if (/^BSS [0-9a-fA-F:]{17}/m.test(output)) return 'iw';
  return 'unknown';
}

export function parseScanOutput(output: string): ScanParseResult {
  const format = detectScanFormat(output);
  switch (format) {
    case 'iwlist':
      return parseIwlistScan(output);
    case 'iw':
      return parseIwScan(output);
    case 'unknown':
      if (output.trim() !== '') {
        logger.warn({ sample: output.substring(0, 200) }, 'Unrecognized scan output');
      }
      return { format, observations: [], skipped: 0 };
  }
}

/**
 * `iwlist <iface> scan`. One block per "Cell NN - Address:" line.
 */
export function parseIwlistScan(output: string): ScanParseResult {
  const blocks: PartialNetwork[] = [];
  let current: PartialNetwork | null = null;

  for (const rawLine of output.split('\n')) {
    const line = rawLine.trim();

    const cell = line.match(/Cell \d+ - Address:\s*([0-9A-Fa-f:]{17})/);
    if (cell) {
      if (current) blocks.push(current);
      current = { bssid: normalizeMac(cell[1] ?? '') };
      continue;
    }
    if (!current) continue;

    const essid = line.match(/^ESSID:"(.*)"$/);
    if (essid) {
      current.ssid = essid[1] ?? '';
      continue;
    }

    const frequency = line.match(/^Frequency:\s*([\d.]+)\s*GHz/);
    if (frequency) {
      const ghz = Number.parseFloat(frequency[1] ?? '');
      if (Number.isFinite(ghz)) current.frequency = Math.round(ghz * 1000);
      const inline = line.match(/\(Channel\s+(\d+)\)/);
      if (inline) current.channel = Number.parseInt(inline[1] ?? '', 10);
      continue;
    }

    const channel = line.match(/^Channel:\s*(\d+)/);
    if (channel) {
      current.channel = Number.parseInt(channel[1] ?? '', 10);
      continue;
    }

    const signal = line.match(/Signal level[=:]\s*(-?\d+(?:\.\d+)?)\s*dBm/);
    if (signal) {
      current.signalDbm = Number.parseFloat(signal[1] ?? '');
      continue;
    }

    if (line.startsWith('Encryption key:off')) {
      current.security = 'Open';
    } else if (line.startsWith('Encryption key:on')) {
      current.privacy = true;
    } else if (line.includes('WPA3') || /\bSAE\b/.test(line)) {
      current.security = 'WPA3';
    } else if (line.includes('WPA2') && current.security !== 'WPA3') {
      current.security = 'WPA2';
    } else if (line.includes('WPA Version') && current.security === undefined) {
      current.security = 'WPA';
    }
  }
  if (current) blocks.push(current);

  return finalize('iwlist', blocks);
}

/**
 * `iw <iface> scan dump`. One block per "BSS xx:xx:..." line.
 */
export function parseIwScan(output: string): ScanParseResult {
  const blocks: PartialNetwork[] = [];
  let current: PartialNetwork | null = null;

  for (const rawLine of output.split('\n')) {
    const bss = rawLine.match(/^BSS ([0-9a-fA-F:]{17})/);
    if (bss) {
      if (current) blocks.push(current);
      current = { bssid: normalizeMac(bss[1] ?? '') };
      continue;
    }
    if (!current) continue;

    const line = rawLine.trim();

    const ssid = line.match(/^SSID:\s?(.*)$/);
    if (ssid) {
      current.ssid = (ssid[1] ?? '').trim();
      continue;
    }

    const freq = line.match(/^freq:\s*([\d.]+)/);
    if (freq) {
      const mhz = Number.parseFloat(freq[1] ?? '');
      if (Number.isFinite(mhz)) current.frequency = Math.round(mhz);
      continue;
    }

    const signal = line.match(/^signal:\s*(-?\d+(?:\.\d+)?)\s*dBm/);
    if (signal) {
      current.signalDbm = Number.parseFloat(signal[1] ?? '');
      continue;
    }

    const channel = line.match(/(?:DS Parameter set: channel|\* primary channel:)\s*(\d+)/);
    if (channel) {
      current.channel ??= Number.parseInt(channel[1] ?? '', 10);
      continue;
    }

    if (line.startsWith('capability:') && line.includes('Privacy')) {
      current.privacy = true;
    } else if (line.startsWith('RSN:')) {
      current.security = current.security === 'WPA3' ? 'WPA3' : 'WPA2';
    } else if (line.includes('Authentication suites:') && /\bSAE\b/.test(line)) {
      current.security = 'WPA3';
    } else if (line.startsWith('WPA:') && current.security === undefined) {
      current.security = 'WPA';
    }
  }
  if (current) blocks.push(current);

  return finalize('iw', blocks);
}

function finalize(format: ScanOutputFormat, blocks: readonly PartialNetwork[]): ScanParseResult {
  const observations: WifiNetworkObservation[] = [];
  let skipped = 0;

  for (const block of blocks) {
    const observation = toObservation(block);
    if (observation) {
      observations.push(observation);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    logger.debug({ format, skipped, parsed: observations.length }, 'Scan blocks without channel information skipped');
  }
  return { format, observations, skipped };
}

function toObservation(block: PartialNetwork): WifiNetworkObservation | null {
  const frequency = block.frequency !== undefined && block.frequency > 0 ? block.frequency : 0;
  const channelFromBlock = block.channel !== undefined && Number.isFinite(block.channel) && block.channel > 0
    ? block.channel
    : 0;

  if (frequency === 0 && channelFromBlock === 0) return null;

  const band: WifiBand = frequency > 0
    ? bandFromFrequency(frequency)
    : channelFromBlock <= 14 ? '2.4GHz' : '5GHz';
  const channel = channelFromBlock > 0 ? channelFromBlock : frequencyToChannel(frequency);
  const signalDbm = block.signalDbm !== undefined && Number.isFinite(block.signalDbm)
    ? block.signalDbm
    : NO_SIGNAL_DBM;
  const ssid = block.ssid ?? '';

  return {
    ssid,
    bssid: block.bssid,
    signalDbm,
    signalPercent: rssiToPercent(signalDbm),
    channel,
    frequency: frequency > 0 ? frequency : channelFrequencyOrZero(channel, band),
    band,
    security: block.security ?? (block.privacy === true ? 'WEP' : 'Open'),
    hidden: ssid === '' || /^(\\x00)+$/.test(ssid),
  };
}
