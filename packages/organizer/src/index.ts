/**
 * @sortwell/organizer
 * 
 * File organization engine.
 * 
 * Real time:
 * - DirectoryWatcher routes new files through the Seiton rules
 * 
 * Scheduled:
 * - Seiri: move files not modified for a number of days
 * - Seiso: empty temporary folders
 * - Duplicate detection by content digest
 * 
 * Every move goes through FileTransferResolver, which never overwrites.
 */

export { OrganizerEngine, type OrganizerEngineOptions } from './engine.js';
export { buildScheduledJobs, buildSeitonStrategies } from './jobs.js';

// Watcher
export {
  DirectoryWatcher,
  nodeWatchFactory,
  type DirectoryWatcherConfig,
  type WatchFactory,
  type WatchRegistration,
} from './watcher/index.js';

// Scheduler
export {
  TaskScheduler,
  DEFAULT_SHUTDOWN_GRACE_MS,
  type ScheduledJob,
  type TaskSchedulerConfig,
  type FamilyStatus,
  type SchedulerStopResult,
} from './scheduler/index.js';

// Strategies
export {
  ExtensionMoveStrategy,
  AgeBasedMoveStrategy,
  TempFolderCleanupStrategy,
  DuplicateDetectionStrategy,
  dispatchCreatedFile,
  orderForDeletion,
  selectSurvivor,
  type ScanContext,
  type ScheduledStrategy,
  type RealtimeStrategy,
  type DispatchOutcome,
  type AgeScanSummary,
  type CleanupResult,
  type FileRecord,
  type DuplicateGroup,
  type DuplicateScanResult,
  type RemediationResult,
} from './strategies/index.js';

// Transfer
export {
  FileTransferResolver,
  buildSuffixedName,
  resolveAvailablePath,
  DEFAULT_MAX_SUFFIX,
  type FileTransferResolverConfig,
  type TransferResult,
} from './transfer/index.js';
