/**
 * Task Scheduler
 * 
 * Runs one master task per enabled family (Seiri, Seiso, duplicate detection)
 * at a fixed rate. Families run independently of each other; within a family
 * the strategies run one after another and a failing strategy is only logged.
 * 
 * Fixed rate: firing k is due at start + initialDelay + k * period. When a
 * firing overruns, the missed ones run back to back; a family never overlaps
 * with itself.
 */

import type { TaskFamily, TaskSchedule } from '@sortwell/core';
import { createLogger, formatDuration, sleep, toMillis } from '@sortwell/utils';
import type { ScanContext, ScheduledStrategy } from '../strategies/index.js';

const log = createLogger({ component: 'task-scheduler' });

export interface ScheduledJob {
  readonly family: TaskFamily;
  readonly schedule: TaskSchedule;
  readonly strategies: readonly ScheduledStrategy[];
}

export interface TaskSchedulerConfig {
  monitorFolders: readonly string[];

  // How long stopScheduler waits for running firings before cancelling them
  shutdownGraceMs?: number;
}

export interface FamilyStatus {
  family: TaskFamily;
  firings: number;
  failures: number;
  active: boolean;
  lastStartedAt?: Date;
  lastDurationMs?: number;
}

export interface SchedulerStopResult {
  // True when the grace period ran out and running tasks were cancelled
  forced: boolean;
}

export const DEFAULT_SHUTDOWN_GRACE_MS = 60_000;

export class TaskScheduler {
  private readonly jobs: ScheduledJob[];
  private readonly monitorFolders: readonly string[];
  private readonly shutdownGraceMs: number;
  // No new firings once aborted
  private readonly shutdown = new AbortController();
  // Passed to strategies; aborted when the grace period runs out
  private readonly cancel = new AbortController();
  private readonly slots: Promise<void>[] = [];
  private readonly status: Map<TaskFamily, FamilyStatus> = new Map();
  private stopping: Promise<SchedulerStopResult> | null = null;
  private started = false;

  constructor(jobs: readonly ScheduledJob[], config: TaskSchedulerConfig) {
    this.jobs = jobs.filter((job) => job.schedule.enabled);
    this.monitorFolders = config.monitorFolders;
    this.shutdownGraceMs = config.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;

    for (const job of this.jobs) {
      this.status.set(job.family, { family: job.family, firings: 0, failures: 0, active: false });
    }

    for (const job of jobs) {
      if (!job.schedule.enabled) {
        log.info({ family: job.family }, 'Task family is disabled');
      }
    }
  }

  /**
   * Schedule every enabled family. Calling it again is a no-op.
   */
  startScheduler(): void {
    if (this.started || this.shutdown.signal.aborted) {
      return;
    }
    this.started = true;

    log.info({ families: this.jobs.map((job) => job.family) }, 'Starting task scheduler');

    for (const job of this.jobs) {
      const { initialDelay, period, timeUnit } = job.schedule;
      const slot = this.runFamily(job, toMillis(initialDelay, timeUnit), toMillis(period, timeUnit))
        .catch((error: unknown) => {
          log.error({ err: error, family: job.family }, 'Task family loop crashed');
        });
      this.slots.push(slot);

      log.info({ family: job.family, initialDelay, period, timeUnit }, 'Task family scheduled');
    }
  }

  /**
   * Stop scheduling and wait up to the grace period for running firings.
   * Idempotent; safe when the scheduler never started.
   */
  stopScheduler(graceMs: number = this.shutdownGraceMs): Promise<SchedulerStopResult> {
    if (!this.stopping) {
      this.stopping = this.performStop(graceMs);
    }
    return this.stopping;
  }

  /**
   * Run one firing of every enabled family (or only `family`) right now
   */
  async runOnce(family?: TaskFamily): Promise<void> {
    for (const job of this.jobs) {
      if (family === undefined || job.family === family) {
        await this.fire(job);
      }
    }
  }

  getStatus(): FamilyStatus[] {
    return Array.from(this.status.values(), (entry) => ({ ...entry }));
  }

  get running(): boolean {
    return this.started && !this.shutdown.signal.aborted;
  }

  // Private methods

  private async runFamily(job: ScheduledJob, delayMs: number, periodMs: number): Promise<void> {
    const signal = this.shutdown.signal;
    let nextAt = Date.now() + delayMs;

    while (!signal.aborted) {
      await sleep(nextAt - Date.now(), signal);
      if (signal.aborted) {
        break;
      }

      await this.fire(job);
      nextAt += periodMs;
    }
  }

  private async fire(job: ScheduledJob): Promise<void> {
    const status = this.status.get(job.family);
    const context: ScanContext = {
      monitorFolders: this.monitorFolders,
      startedAt: new Date(),
      signal: this.cancel.signal,
    };

    if (status) {
      status.firings++;
      status.active = true;
      status.lastStartedAt = context.startedAt;
    }

    log.info({ family: job.family }, 'Scheduled task started');

    for (const strategy of job.strategies) {
      if (context.signal.aborted) {
        break;
      }
      try {
        await strategy.execute(context);
      } catch (error) {
        if (status) {
          status.failures++;
        }
        log.error({ err: error, family: job.family, strategy: strategy.name }, 'Strategy failed; continuing');
      }
    }

    const durationMs = Date.now() - context.startedAt.getTime();
    if (status) {
      status.active = false;
      status.lastDurationMs = durationMs;
    }

    log.info({ family: job.family, duration: formatDuration(durationMs) }, 'Scheduled task finished');
  }

  private async performStop(graceMs: number): Promise<SchedulerStopResult> {
    this.shutdown.abort();

    if (!this.started) {
      return { forced: false };
    }

    log.info('Stopping task scheduler');

    const graceTimer = new AbortController();
    const finished = await Promise.race([
      Promise.allSettled(this.slots).then(() => true),
      sleep(graceMs, graceTimer.signal).then(() => false),
    ]);
    graceTimer.abort();

    if (!finished) {
      const active = this.getStatus().filter((entry) => entry.active).map((entry) => entry.family);
      log.warn({ graceMs, active }, 'Grace period elapsed; cancelling running tasks');
      this.cancel.abort();
      return { forced: true };
    }

    log.info('Task scheduler stopped');
    return { forced: false };
  }
}
