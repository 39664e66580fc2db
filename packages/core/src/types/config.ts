/**
 * Configuration Types
 * 
 * The engine receives one of these, already validated, and never mutates it.
 */

import type { TimeUnit } from '@sortwell/utils';

export type { TimeUnit };

export type TaskFamily = 'seiri' | 'seiso' | 'duplicates';

export type KeepStrategy = 'NEWEST' | 'OLDEST' | 'MANUAL';

export interface SeitonRule {
  readonly name: string;
  // Lowercased, without the leading dot
  readonly extensions: readonly string[];
  readonly destination: string;
}

export interface TaskSchedule {
  readonly enabled: boolean;
  readonly initialDelay: number;
  readonly period: number;
  readonly timeUnit: TimeUnit;
}

export interface MoveOldFilesRule {
  readonly enabled: boolean;
  readonly days: number;
  readonly destination: string;
}

export interface SeiriConfig extends TaskSchedule {
  readonly rules: {
    readonly moveFilesNotAccessedForDays?: MoveOldFilesRule;
  };
}

export interface CleanTempFoldersRule {
  readonly enabled: boolean;
  readonly folders: readonly string[];
}

export interface SeisoConfig extends TaskSchedule {
  readonly rules: {
    readonly cleanTemporaryFolders?: CleanTempFoldersRule;
  };
}

export interface DuplicateRules {
  // 0 disables the bound
  readonly minFileSizeBytes: number;
  readonly maxFileSizeBytes: number;
  readonly autoRemove: boolean;
  // Empty means duplicates are deleted instead of quarantined
  readonly duplicatesDestination: string;
  readonly keepStrategy: KeepStrategy;
}

export interface DuplicateDetectionConfig extends TaskSchedule {
  readonly rules: DuplicateRules;
}

export interface Configuration {
  readonly monitorFolders: readonly string[];
  readonly seitonRules: readonly SeitonRule[];
  readonly seiriConfig: SeiriConfig;
  readonly seisoConfig: SeisoConfig;
  readonly duplicateDetectionConfig: DuplicateDetectionConfig;
}
