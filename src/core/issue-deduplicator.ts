import { createChildLogger } from '../utils/logger.js';
import type { Issue } from '../types/analysis.js';

const logger = createChildLogger('issue-deduplicator');

export type RepeatPolicy = 'repeat' | 'suppress';

export interface IssueDeduplicatorOptions {
  policy: RepeatPolicy;
  suppressWindowMinutes: number;
}

export class IssueDeduplicator {
  private readonly policy: RepeatPolicy;
  private readonly windowMs: number;
  private lastEmitted = new Map<string, number>();

  constructor(options: IssueDeduplicatorOptions) {
    this.policy = options.policy;
    this.windowMs = options.suppressWindowMinutes * 60 * 1000;
  }

  getPolicy(): RepeatPolicy {
    return this.policy;
  }

  filter(issues: readonly Issue[], now: Date = new Date()): Issue[] {
    if (this.policy === 'repeat') {
      return [...issues];
    }

    const nowMs = now.getTime();
    const kept: Issue[] = [];
    let suppressed = 0;

    for (const issue of issues) {
      // Healthy is a status, not a finding; never suppressed
      if (issue.type === 'healthy') {
        kept.push(issue);
        continue;
      }

      const key = `${issue.type}:${issue.severity}`;
      const last = this.lastEmitted.get(key);
      if (last !== undefined && nowMs - last < this.windowMs) {
        suppressed++;
        continue;
      }

      this.lastEmitted.set(key, nowMs);
      kept.push(issue);
    }

    if (suppressed > 0) {
      logger.debug({ suppressed, kept: kept.length }, 'Repeated issues suppressed');
    }

    if (kept.length === 0) {
      kept.push({
        severity: 'info',
        type: 'ongoing',
        title: `${suppressed} ongoing issue(s)`,
        description: `No new issues; ${suppressed} previously reported issue(s) persist`,
        recommendation: 'review_ongoing_issues',
        details: { suppressed },
      });
    }

    return kept;
  }

  reset(): void {
    this.lastEmitted.clear();
  }
}
