import { createChildLogger } from '../utils/logger.js';
import { MAX_TIMER_DELAY_MS } from '../utils/async-helpers.js';
import { ContractViolationError, CycleCancelledError, EngineError, ErrorCode } from '../utils/errors.js';
import type { RunCycleOptions } from './analysis-orchestrator.js';

const logger = createChildLogger('analysis-scheduler');

export interface CycleRunner {
  runCycle(options?: RunCycleOptions): Promise<unknown>;
}

export class AnalysisScheduler {
  private timer: NodeJS.Timeout | null = null;
  private controller: AbortController | null = null;
  private readonly intervalMs: number;

  constructor(
    private readonly runner: CycleRunner,
    intervalSeconds: number
  ) {
    if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0 || intervalSeconds * 1000 > MAX_TIMER_DELAY_MS) {
      throw new ContractViolationError(
        ErrorCode.INVALID_PARAMETER,
        `Cycle interval must be between 0 and ${Math.floor(MAX_TIMER_DELAY_MS / 1000)} seconds, got ${intervalSeconds}`,
        { context: { intervalSeconds } }
      );
    }
    this.intervalMs = intervalSeconds * 1000;
  }

  isActive(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      logger.warn('Scheduler already running');
      return;
    }

    this.controller = new AbortController();
    this.timer = setInterval(() => this.trigger(), this.intervalMs);
    logger.info({ intervalMs: this.intervalMs }, 'Scheduler started');
    this.trigger();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.controller) {
      this.controller.abort();
      this.controller = null;
      logger.info('Scheduler stopped');
    }
  }

  private trigger(): void {
    const signal = this.controller?.signal;
    this.runner.runCycle({ signal }).catch((err: unknown) => {
      if (err instanceof CycleCancelledError) {
        logger.debug({ step: err.context?.['step'] }, 'Scheduled cycle cancelled');
        return;
      }
      const error = EngineError.fromError(err, ErrorCode.CYCLE_FAILED);
      logger.error({ err: error.toJSON() }, 'Scheduled cycle failed');
    });
  }
}
