import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AnalysisScheduler } from '../src/core/analysis-scheduler.js';
import { ContractViolationError, CycleCancelledError } from '../src/utils/errors.js';
import type { RunCycleOptions } from '../src/core/analysis-orchestrator.js';

describe('AnalysisScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should reject a non-positive interval', () => {
    const runner = { runCycle: vi.fn().mockResolvedValue(undefined) };
    expect(() => new AnalysisScheduler(runner, 0)).toThrow(ContractViolationError);
    expect(() => new AnalysisScheduler(runner, Number.NaN)).toThrow(ContractViolationError);
  });

  it('should reject an interval the platform timer cannot hold', () => {
    const runner = { runCycle: vi.fn().mockResolvedValue(undefined) };
    expect(() => new AnalysisScheduler(runner, 3_500_000)).toThrow(ContractViolationError);
    expect(() => new AnalysisScheduler(runner, 2_147_484)).toThrow(ContractViolationError);
    expect(new AnalysisScheduler(runner, 2_147_483).isActive()).toBe(false);
  });

  it('should run immediately and then on every interval', async () => {
    const runner = { runCycle: vi.fn().mockResolvedValue(undefined) };
    const scheduler = new AnalysisScheduler(runner, 60);

    scheduler.start();
    expect(scheduler.isActive()).toBe(true);
    expect(runner.runCycle).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(runner.runCycle).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(60_000);
    expect(runner.runCycle).toHaveBeenCalledTimes(3);

    scheduler.stop();
  });

  it('should stop triggering and abort the running cycle on stop', async () => {
    const signals: Array<AbortSignal | undefined> = [];
    const runner = {
      runCycle: vi.fn((options?: RunCycleOptions) => {
        signals.push(options?.signal);
        return Promise.resolve();
      }),
    };
    const scheduler = new AnalysisScheduler(runner, 10);

    scheduler.start();
    scheduler.stop();
    await vi.advanceTimersByTimeAsync(30_000);

    expect(scheduler.isActive()).toBe(false);
    expect(runner.runCycle).toHaveBeenCalledTimes(1);
    expect(signals[0]?.aborted).toBe(true);
  });

  it('should ignore a second start', () => {
    const runner = { runCycle: vi.fn().mockResolvedValue(undefined) };
    const scheduler = new AnalysisScheduler(runner, 10);

    scheduler.start();
    scheduler.start();
    expect(runner.runCycle).toHaveBeenCalledTimes(1);
    scheduler.stop();
  });

  it('should use a fresh signal after a restart', () => {
    const signals: Array<AbortSignal | undefined> = [];
    const runner = {
      runCycle: vi.fn((options?: RunCycleOptions) => {
        signals.push(options?.signal);
        return Promise.resolve();
      }),
    };
    const scheduler = new AnalysisScheduler(runner, 10);

    scheduler.start();
    scheduler.stop();
    scheduler.start();

    expect(signals).toHaveLength(2);
    expect(signals[0]?.aborted).toBe(true);
    expect(signals[1]?.aborted).toBe(false);
    scheduler.stop();
  });

  it('should keep running after a failed or cancelled cycle', async () => {
    const runner = {
      runCycle: vi.fn()
        .mockRejectedValueOnce(new Error('collector crashed'))
        .mockRejectedValueOnce(new CycleCancelledError('metrics'))
        .mockResolvedValue(undefined),
    };
    const scheduler = new AnalysisScheduler(runner, 5);

    scheduler.start();
    await vi.advanceTimersByTimeAsync(10_000);
    expect(runner.runCycle).toHaveBeenCalledTimes(3);
    expect(scheduler.isActive()).toBe(true);
    scheduler.stop();
  });
});
