/**
 * Strategy Wiring
 * 
 * Turns a configuration into the ordered Seiton rule list and the scheduled
 * job of each task family.
 */

import type { Configuration } from '@sortwell/core';
import {
  AgeBasedMoveStrategy,
  DuplicateDetectionStrategy,
  ExtensionMoveStrategy,
  TempFolderCleanupStrategy,
  type RealtimeStrategy,
  type ScheduledStrategy,
} from './strategies/index.js';
import type { ScheduledJob } from './scheduler/index.js';
import type { FileTransferResolver } from './transfer/index.js';

export function buildSeitonStrategies(
  config: Configuration,
  resolver: FileTransferResolver
): RealtimeStrategy[] {
  return config.seitonRules.map((rule) => new ExtensionMoveStrategy(rule, resolver));
}

export function buildScheduledJobs(
  config: Configuration,
  resolver: FileTransferResolver
): ScheduledJob[] {
  const { seiriConfig, seisoConfig, duplicateDetectionConfig } = config;

  const seiri: ScheduledStrategy[] = [];
  if (seiriConfig.rules.moveFilesNotAccessedForDays) {
    seiri.push(new AgeBasedMoveStrategy(seiriConfig.rules.moveFilesNotAccessedForDays, resolver));
  }

  const seiso: ScheduledStrategy[] = [];
  if (seisoConfig.rules.cleanTemporaryFolders) {
    seiso.push(new TempFolderCleanupStrategy(seisoConfig.rules.cleanTemporaryFolders));
  }

  return [
    { family: 'seiri', schedule: seiriConfig, strategies: seiri },
    { family: 'seiso', schedule: seisoConfig, strategies: seiso },
    {
      family: 'duplicates',
      schedule: duplicateDetectionConfig,
      strategies: [new DuplicateDetectionStrategy(duplicateDetectionConfig.rules, resolver)],
    },
  ];
}
