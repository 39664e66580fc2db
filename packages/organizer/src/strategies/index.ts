export type { ScanContext, ScheduledStrategy, RealtimeStrategy } from './types.js';
export { ExtensionMoveStrategy } from './extensionMoveStrategy.js';
export { dispatchCreatedFile, type DispatchOutcome } from './dispatch.js';
export { AgeBasedMoveStrategy, type AgeScanSummary } from './ageBasedMoveStrategy.js';
export {
  TempFolderCleanupStrategy,
  orderForDeletion,
  type CleanupResult,
} from './tempFolderCleanupStrategy.js';
export {
  DuplicateDetectionStrategy,
  selectSurvivor,
  type FileRecord,
  type DuplicateGroup,
  type DuplicateScanResult,
  type RemediationResult,
} from './duplicateDetectionStrategy.js';
