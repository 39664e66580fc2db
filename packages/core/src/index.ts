/**
 * @sortwell/core
 * 
 * Shared domain package containing:
 * - Configuration types
 * - Configuration schema and loader
 * - Error handling
 */

// Types
export type {
  Configuration,
  SeitonRule,
  TaskSchedule,
  TaskFamily,
  SeiriConfig,
  SeisoConfig,
  MoveOldFilesRule,
  CleanTempFoldersRule,
  DuplicateDetectionConfig,
  DuplicateRules,
  KeepStrategy,
  TimeUnit,
} from './types/config.js';

// Configuration
export {
  configurationSchema,
  seitonRuleSchema,
  seiriConfigSchema,
  seisoConfigSchema,
  duplicateDetectionConfigSchema,
  duplicateRulesSchema,
  keepStrategySchema,
  timeUnitSchema,
  loadConfiguration,
  parseConfiguration,
  validateMonitorFolders,
  type ConfigurationInput,
} from './config/index.js';

// Errors
export {
  SortwellError,
  ConfigurationError,
  FileTransferError,
  UniqueNameExhaustedError,
} from './errors/index.js';
