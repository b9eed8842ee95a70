// src/services/scheduler.ts
// What: Non-overlapping periodic runner for batch jobs (ingestion, re-ranking).
// How: Each PeriodicJob owns one timer that attempts a run at a fixed interval. A tick only launches a run when
//      the previous one has finished, so runs never overlap and the job naturally "restarts" on the next tick after
//      a crash. Status (last run window, error, result) lives on the job instance, not in module globals.

import baseLogger, { type Logger } from '../logging.js';
import { newCorrelationId } from './indexer.js';

export interface JobStatus<T> {
  name: string;
  started: boolean;
  interval_ms: number;
  is_running: boolean;
  runs_completed: number;
  last_correlation_id?: string;
  last_run_start?: string; // ISO
  last_run_end?: string; // ISO
  last_run_duration_ms?: number;
  last_error?: string;
  last_result?: T;
  next_scheduled_run_at?: string; // ISO (approximation, based on the last tick time)
}

export class PeriodicJob<T> {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private runsCompleted = 0;
  private lastTickAt: number | undefined;
  private lastCorrelationId: string | undefined;
  private lastRunStart: number | undefined;
  private lastRunEnd: number | undefined;
  private lastError: string | undefined;
  private lastResult: T | undefined;
  private readonly log: Logger;

  constructor(
    readonly name: string,
    readonly intervalMs: number,
    private readonly task: (correlationId: string) => Promise<T>,
    logger?: Logger,
  ) {
    this.log = (logger ?? baseLogger).child({ job: name });
  }

  /** Start the timer; with runImmediately a first attempt is kicked off without waiting an interval. */
  start(opts: { runImmediately?: boolean } = {}): void {
    if (this.timer) return;
    this.lastTickAt = Date.now();
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.timer.unref();
    this.log.info({ interval_ms: this.intervalMs }, 'Scheduler started');
    if (opts.runImmediately) void this.tick();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Attempt a run if one is not already in progress. Resolves true when this call started (and finished) a run,
   * false when it was skipped because another run was active.
   */
  async runIfIdle(): Promise<boolean> {
    if (this.running) return false;
    const correlationId = newCorrelationId();
    this.lastCorrelationId = correlationId;
    this.lastRunStart = Date.now();
    this.lastError = undefined;
    this.log.info({ correlationId }, 'Run starting');

    this.running = this.task(correlationId)
      .then((result) => {
        this.lastResult = result;
        this.log.info({ correlationId }, 'Run finished');
      })
      .catch((err: unknown) => {
        this.lastError = err instanceof Error ? err.message : String(err);
        this.log.error({ err, correlationId }, 'Run failed');
      })
      .finally(() => {
        this.lastRunEnd = Date.now();
        this.runsCompleted += 1;
        this.running = null;
      });
    await this.running;
    return true;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  status(): JobStatus<T> {
    return {
      name: this.name,
      started: this.timer !== null,
      interval_ms: this.intervalMs,
      is_running: this.isRunning,
      runs_completed: this.runsCompleted,
      last_correlation_id: this.lastCorrelationId,
      last_run_start: this.lastRunStart ? new Date(this.lastRunStart).toISOString() : undefined,
      last_run_end: this.lastRunEnd ? new Date(this.lastRunEnd).toISOString() : undefined,
      last_run_duration_ms:
        this.lastRunStart && this.lastRunEnd && !this.isRunning ? this.lastRunEnd - this.lastRunStart : undefined,
      last_error: this.lastError,
      last_result: this.lastResult,
      next_scheduled_run_at:
        this.timer && this.lastTickAt !== undefined ? new Date(this.lastTickAt + this.intervalMs).toISOString() : undefined,
    };
  }

  private async tick(): Promise<void> {
    this.lastTickAt = Date.now();
    await this.runIfIdle();
  }
}
