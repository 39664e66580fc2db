/**
 * Organizer Engine
 * 
 * Lifecycle controller: starts the scheduler, then watches until stopped.
 * `stop()` is the shutdown hook; the owning process calls it on exit signals.
 */

import type { Configuration, TaskFamily } from '@sortwell/core';
import { createLogger } from '@sortwell/utils';
import { buildScheduledJobs, buildSeitonStrategies } from './jobs.js';
import { TaskScheduler, type SchedulerStopResult } from './scheduler/index.js';
import type { RealtimeStrategy } from './strategies/index.js';
import { FileTransferResolver } from './transfer/index.js';
import { DirectoryWatcher, type WatchFactory } from './watcher/index.js';

const log = createLogger({ component: 'engine' });

export interface OrganizerEngineOptions {
  settleMs?: number;
  shutdownGraceMs?: number;
  maxQueuedEvents?: number;
  watchFactory?: WatchFactory;
  resolver?: FileTransferResolver;
}

export class OrganizerEngine {
  readonly watcher: DirectoryWatcher;
  readonly scheduler: TaskScheduler;
  private readonly seitonStrategies: RealtimeStrategy[];
  private stopping: Promise<SchedulerStopResult> | null = null;
  private started = false;

  constructor(
    private readonly config: Configuration,
    options: OrganizerEngineOptions = {}
  ) {
    const resolver = options.resolver ?? new FileTransferResolver();

    this.seitonStrategies = buildSeitonStrategies(config, resolver);
    this.watcher = new DirectoryWatcher({
      settleMs: options.settleMs,
      maxQueuedEvents: options.maxQueuedEvents,
      watchFactory: options.watchFactory,
    });
    this.scheduler = new TaskScheduler(buildScheduledJobs(config, resolver), {
      monitorFolders: config.monitorFolders,
      shutdownGraceMs: options.shutdownGraceMs,
    });
  }

  /**
   * Start scheduled tasks and watch the monitored folders.
   * Resolves when watching ends.
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new Error('Engine is already running');
    }
    this.started = true;

    log.info({
      monitorFolders: this.config.monitorFolders,
      seitonRules: this.seitonStrategies.length,
    }, 'Starting organizer engine');

    this.scheduler.startScheduler();
    await this.watcher.start(this.config.monitorFolders, this.seitonStrategies);

    log.info('Organizer engine watch loop ended');
  }

  /**
   * Stop watching and scheduling. Safe to call repeatedly or before start.
   */
  stop(): Promise<SchedulerStopResult> {
    if (!this.stopping) {
      log.info('Shutting down organizer engine');
      this.watcher.stop();
      this.stopping = this.scheduler.stopScheduler();
    }
    return this.stopping;
  }

  /**
   * Run every enabled scheduled family once, without watching
   */
  runOnce(family?: TaskFamily): Promise<void> {
    return this.scheduler.runOnce(family);
  }
}
