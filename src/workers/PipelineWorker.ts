import logger from '../config/logger';
import { MAX_POLL_INTERVAL_SECONDS, MIN_POLL_INTERVAL_SECONDS } from '../config/settings';
import type { PipelineScheduler } from '../services/pipeline/scheduler';

const WORKER_NAME = '[PipelineWorker]';

export function clampIntervalMs(intervalMs: number): number {
  const min = MIN_POLL_INTERVAL_SECONDS * 1000;
  const max = MAX_POLL_INTERVAL_SECONDS * 1000;
  if (!Number.isFinite(intervalMs)) return min;
  return Math.min(max, Math.max(min, intervalMs));
}

export const DEFAULT_SWEEP_INTERVAL_MS = 60 * 60 * 1000;

export interface WorkerOptions {
  /** Delay before the first tick. */
  initialDelayMs?: number;
  /** Housekeeping run on its own, slower interval (event log retention). */
  sweep?: () => number;
  sweepIntervalMs?: number;
}

/** Drives the scheduler on a fixed interval. Overlapping ticks are skipped. */
export class PipelineWorker {
  private tickInterval: NodeJS.Timeout | null = null;
  private sweepInterval: NodeJS.Timeout | null = null;
  private startTimer: NodeJS.Timeout | null = null;
  private isTicking = false;
  private current: Promise<void> | null = null;
  readonly intervalMs: number;
  private readonly initialDelayMs: number;

  constructor(private readonly scheduler: PipelineScheduler, intervalMs: number, private readonly options: WorkerOptions = {}) {
    this.intervalMs = clampIntervalMs(intervalMs);
    this.initialDelayMs = options.initialDelayMs ?? 1000;
  }

  get running(): boolean {
    return this.tickInterval !== null;
  }

  start(): void {
    if (this.tickInterval) {
      logger.info(`${WORKER_NAME} Already running`);
      return;
    }

    logger.info(`${WORKER_NAME} Starting, tick every ${this.intervalMs / 1000}s`);
    this.tickInterval = setInterval(() => {
      void this.runTick();
    }, this.intervalMs);

    if (this.options.sweep) {
      this.sweepInterval = setInterval(() => {
        this.runSweep();
      }, this.options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS);
    }

    // First tick shortly after boot so the HTTP server is up
    this.startTimer = setTimeout(() => {
      this.startTimer = null;
      void this.runTick();
    }, this.initialDelayMs);
  }

  /** Stop scheduling and wait for a tick in flight to finish. */
  async stop(): Promise<void> {
    if (this.tickInterval) {
      clearInterval(this.tickInterval);
      this.tickInterval = null;
    }
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }
    if (this.startTimer) {
      clearTimeout(this.startTimer);
      this.startTimer = null;
    }
    if (this.current) {
      await this.current;
    }
    logger.info(`${WORKER_NAME} Stopped`);
  }

  runTick(): Promise<void> {
    if (this.isTicking) {
      return this.current ?? Promise.resolve();
    }

    this.isTicking = true;
    this.current = this.tickOnce().finally(() => {
      this.isTicking = false;
      this.current = null;
    });
    return this.current;
  }

  /** Run the housekeeping task once. Returns what it removed, 0 on failure. */
  runSweep(): number {
    if (!this.options.sweep) return 0;
    try {
      return this.options.sweep();
    } catch (error) {
      logger.error(`${WORKER_NAME} Sweep error:`, error);
      return 0;
    }
  }

  private async tickOnce(): Promise<void> {
    try {
      const result = await this.scheduler.tick();
      if (result && (result.admitted || result.searched || result.submitted || result.converted || result.imported)) {
        logger.debug(
          `${WORKER_NAME} Tick: ${result.admitted} admitted, ${result.searched} searched, ${result.submitted} submitted, ` +
            `${result.polled} polled, ${result.converted} converted, ${result.imported} imported, ${result.failures} failed`,
        );
      }
    } catch (error) {
      logger.error(`${WORKER_NAME} Tick error:`, error);
    }
  }
}
