/**
 * Strategy Types
 */

import type { TransferResult } from '../transfer/index.js';

/**
 * Input to one scheduled firing. Owned by that firing only.
 */
export interface ScanContext {
  readonly monitorFolders: readonly string[];
  readonly startedAt: Date;
  // Aborted when the scheduler gives up waiting on shutdown
  readonly signal: AbortSignal;
}

/**
 * A rule run by the scheduler over whole directory trees
 */
export interface ScheduledStrategy {
  readonly name: string;
  execute(context: ScanContext): Promise<void>;
}

/**
 * A rule applied by the watcher to one newly created file
 */
export interface RealtimeStrategy {
  readonly name: string;
  // `extension` is lowercased, without the dot
  matches(extension: string): boolean;
  apply(filePath: string): Promise<TransferResult>;
}
