import { describe, it, expect } from 'vitest';
import { IssueDeduplicator } from '../src/core/issue-deduplicator.js';
import { healthyIssue } from '../src/core/health-metrics-aggregator.js';
import type { Issue } from '../src/types/analysis.js';

const T0 = new Date('2026-01-15T12:00:00.000Z');

function minutesLater(minutes: number): Date {
  return new Date(T0.getTime() + minutes * 60 * 1000);
}

const packetLoss: Issue = {
  severity: 'critical',
  type: 'packet_loss',
  title: 'Packet loss too high: 7%',
  description: 'Current packet loss is 7% (critical at 5%)',
  recommendation: 'check_congestion_or_cabling',
};

const latency: Issue = {
  severity: 'warning',
  type: 'latency',
  title: 'Latency elevated: 150ms',
  description: 'Average latency is 150ms (warning at 100ms)',
  recommendation: 'keep_monitoring',
};

describe('IssueDeduplicator', () => {
  it('should pass everything through under the repeat policy', () => {
    const dedup = new IssueDeduplicator({ policy: 'repeat', suppressWindowMinutes: 60 });
    expect(dedup.getPolicy()).toBe('repeat');
    expect(dedup.filter([packetLoss], T0)).toEqual([packetLoss]);
    expect(dedup.filter([packetLoss], minutesLater(1))).toEqual([packetLoss]);
  });

  it('should suppress repeats inside the window', () => {
    const dedup = new IssueDeduplicator({ policy: 'suppress', suppressWindowMinutes: 60 });
    expect(dedup.filter([packetLoss, latency], T0)).toEqual([packetLoss, latency]);
    expect(dedup.filter([packetLoss, latency], minutesLater(30))).toEqual([
      {
        severity: 'info',
        type: 'ongoing',
        title: '2 ongoing issue(s)',
        description: 'No new issues; 2 previously reported issue(s) persist',
        recommendation: 'review_ongoing_issues',
        details: { suppressed: 2 },
      },
    ]);
  });

  it('should emit again once the window has passed', () => {
    const dedup = new IssueDeduplicator({ policy: 'suppress', suppressWindowMinutes: 60 });
    dedup.filter([packetLoss], T0);
    expect(dedup.filter([packetLoss], minutesLater(59))[0]?.type).toBe('ongoing');
    expect(dedup.filter([packetLoss], minutesLater(60))).toEqual([packetLoss]);
  });

  it('should treat a new severity as a new issue', () => {
    const dedup = new IssueDeduplicator({ policy: 'suppress', suppressWindowMinutes: 60 });
    dedup.filter([packetLoss], T0);
    const warning: Issue = { ...packetLoss, severity: 'warning', title: 'Packet loss elevated: 2%' };
    expect(dedup.filter([packetLoss, warning], minutesLater(5))).toEqual([warning]);
  });

  it('should never suppress the healthy status', () => {
    const dedup = new IssueDeduplicator({ policy: 'suppress', suppressWindowMinutes: 60 });
    expect(dedup.filter([healthyIssue()], T0)).toEqual([healthyIssue()]);
    expect(dedup.filter([healthyIssue()], minutesLater(1))).toEqual([healthyIssue()]);
  });

  it('should forget history on reset', () => {
    const dedup = new IssueDeduplicator({ policy: 'suppress', suppressWindowMinutes: 60 });
    dedup.filter([latency], T0);
    dedup.reset();
    expect(dedup.filter([latency], minutesLater(1))).toEqual([latency]);
  });
});
