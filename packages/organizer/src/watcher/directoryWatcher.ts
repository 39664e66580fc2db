/**
 * Directory Watcher
 * 
 * Watches monitored folders (one level, not recursive) for new entries and
 * hands each new regular file to the ordered Seiton rules.
 * 
 * - Notifications for the same path are debounced by the settle delay
 * - Settled paths are queued and drained in batches by a single loop
 * - `start()` resolves only once the loop has exited
 * - A folder whose watch breaks is dropped; other folders keep working
 * 
 * Events:
 * - 'ready'      { paths }
 * - 'dispatched' { path, rule, result }
 * - 'overflow'   { dropped }
 * - 'unwatched'  { path, reason }
 * - 'close'
 */

import { EventEmitter } from 'node:events';
import { watch } from 'node:fs';
import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger, errorCode, pathExists } from '@sortwell/utils';
import { dispatchCreatedFile, type RealtimeStrategy } from '../strategies/index.js';

const log = createLogger({ component: 'directory-watcher' });

export interface WatchRegistration {
  close(): void;
}

/**
 * Registers a single-level watch. `onEvent` receives the raw event type and
 * the entry name relative to the folder.
 */
export type WatchFactory = (
  folder: string,
  onEvent: (eventType: string, filename: string | null) => void,
  onError: (error: unknown) => void
) => WatchRegistration;

export interface DirectoryWatcherConfig {
  // Delay after the last notification for a path before it is processed
  settleMs?: number;

  // Pending paths beyond this are dropped and reported as overflow
  maxQueuedEvents?: number;

  watchFactory?: WatchFactory;
}

// Errors meaning the folder itself is gone or no longer accessible
const INVALIDATION_CODES = new Set(['ENOENT', 'EPERM']);

export const nodeWatchFactory: WatchFactory = (folder, onEvent, onError) => {
  const watcher = watch(folder, { persistent: true }, (eventType, filename) => {
    onEvent(eventType, filename);
  });
  watcher.on('error', onError);
  return watcher;
};

export class DirectoryWatcher extends EventEmitter {
  private readonly config: Required<DirectoryWatcherConfig>;
  private readonly controller = new AbortController();
  private readonly registrations: Map<string, WatchRegistration> = new Map();
  private readonly debounceTimers: Map<string, NodeJS.Timeout> = new Map();
  private queue: string[] = [];
  private dropped = 0;
  private wake: (() => void) | null = null;
  private fatalError: unknown = null;
  private isRunning = false;
  private hasStarted = false;

  constructor(config: DirectoryWatcherConfig = {}) {
    super();

    this.config = {
      settleMs: config.settleMs ?? 500,
      maxQueuedEvents: config.maxQueuedEvents ?? 4096,
      watchFactory: config.watchFactory ?? nodeWatchFactory,
    };
  }

  /**
   * Watch `folders` and dispatch new files to `strategies` in order.
   * Resolves when stopped or when the watch fails beyond recovery.
   */
  async start(folders: readonly string[], strategies: readonly RealtimeStrategy[]): Promise<void> {
    if (this.hasStarted) {
      throw new Error('Watcher has already been started');
    }
    this.hasStarted = true;

    if (this.controller.signal.aborted) {
      log.info('Stop requested before start; not watching');
      return;
    }

    this.isRunning = true;
    log.info('Starting directory watcher');

    try {
      for (const folder of folders) {
        this.register(folder);
      }

      if (this.registrations.size === 0) {
        log.error('No monitored folder could be watched');
        return;
      }

      this.emit('ready', { paths: this.getWatchedPaths() });
      log.info({ paths: this.getWatchedPaths() }, 'Waiting for new files');

      await this.loop(strategies);
    } finally {
      this.teardown();
    }
  }

  /**
   * Ask the loop to exit. Safe to call at any time, any number of times.
   */
  stop(): void {
    if (this.controller.signal.aborted) {
      return;
    }
    log.info('Stopping directory watcher');
    this.controller.abort();
    this.wakeLoop();
  }

  /**
   * Get currently watched paths
   */
  getWatchedPaths(): string[] {
    return Array.from(this.registrations.keys());
  }

  /**
   * Check if watcher is running
   */
  get running(): boolean {
    return this.isRunning;
  }

  // Private methods

  private register(folder: string): void {
    try {
      const registration = this.config.watchFactory(
        folder,
        (eventType, filename) => this.handleNotification(folder, eventType, filename),
        (error) => this.handleWatchError(folder, error)
      );
      this.registrations.set(folder, registration);
      log.info({ path: folder }, 'Watching folder');
    } catch (error) {
      log.warn({ err: error, path: folder }, 'Cannot watch folder; ignoring it');
    }
  }

  private async loop(strategies: readonly RealtimeStrategy[]): Promise<void> {
    const signal = this.controller.signal;

    while (!signal.aborted) {
      const batch = await this.nextBatch();

      if (this.dropped > 0) {
        log.warn({ dropped: this.dropped }, 'Event overflow; some notifications were lost');
        this.emit('overflow', { dropped: this.dropped });
        this.dropped = 0;
      }

      for (const path of batch) {
        if (signal.aborted) {
          break;
        }
        await this.processCreated(path, strategies);
      }

      await this.verifyRegistrations();
    }

    if (this.fatalError !== null) {
      log.error({ err: this.fatalError }, 'Watch loop terminated by an I/O failure');
    }
  }

  private nextBatch(): Promise<string[]> {
    if (this.queue.length > 0 || this.controller.signal.aborted) {
      return Promise.resolve(this.drain());
    }

    return new Promise((resolve) => {
      this.wake = () => {
        this.wake = null;
        resolve(this.drain());
      };
    });
  }

  private drain(): string[] {
    const batch = this.queue;
    this.queue = [];
    return batch;
  }

  private wakeLoop(): void {
    this.wake?.();
  }

  private handleNotification(folder: string, eventType: string, filename: string | null): void {
    // 'rename' covers creation (and deletion); content changes are not new files
    if (!this.isRunning || eventType !== 'rename' || !filename) {
      return;
    }

    const fullPath = join(folder, filename);
    const existingTimer = this.debounceTimers.get(fullPath);

    if (existingTimer) {
      clearTimeout(existingTimer);
    } else if (this.debounceTimers.size + this.queue.length >= this.config.maxQueuedEvents) {
      this.dropped++;
      this.wakeLoop();
      return;
    }

    const timer = setTimeout(() => {
      this.debounceTimers.delete(fullPath);
      this.queue.push(fullPath);
      this.wakeLoop();
    }, this.config.settleMs);

    this.debounceTimers.set(fullPath, timer);
  }

  private async processCreated(path: string, strategies: readonly RealtimeStrategy[]): Promise<void> {
    const stats = await stat(path).catch(() => null);

    if (!stats || !stats.isFile()) {
      log.debug({ path }, 'Not a regular file (or gone); ignoring');
      return;
    }

    log.info({ path }, 'Processing new file');
    const outcome = await dispatchCreatedFile(path, strategies);

    if (outcome) {
      this.emit('dispatched', {
        path,
        rule: outcome.strategy.name,
        result: outcome.result,
      });
    }
  }

  private handleWatchError(folder: string, error: unknown): void {
    const code = errorCode(error);

    if (code !== undefined && INVALIDATION_CODES.has(code)) {
      this.unregister(folder, code);
      return;
    }

    this.fatalError = error;
    this.controller.abort();
    this.wakeLoop();
  }

  private async verifyRegistrations(): Promise<void> {
    for (const folder of this.getWatchedPaths()) {
      const exists = await pathExists(folder).catch(() => false);
      if (!exists) {
        this.unregister(folder, 'ENOENT');
      }
    }
  }

  private unregister(folder: string, reason: string): void {
    const registration = this.registrations.get(folder);
    if (!registration) {
      return;
    }

    registration.close();
    this.registrations.delete(folder);
    log.warn({ path: folder, reason }, 'Watch registration is no longer valid; folder dropped');
    this.emit('unwatched', { path: folder, reason });
  }

  private teardown(): void {
    for (const [folder, registration] of this.registrations) {
      registration.close();
      this.registrations.delete(folder);
    }

    for (const timer of this.debounceTimers.values()) {
      clearTimeout(timer);
    }
    this.debounceTimers.clear();
    this.queue = [];

    this.isRunning = false;
    this.wake = null;
    log.info('Directory watcher stopped');
    this.emit('close');
  }
}
