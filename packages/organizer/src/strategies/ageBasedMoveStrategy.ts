/**
 * Age-Based Move Strategy (Seiri)
 * 
 * Moves files not modified for more than `days` into
 * `destination/<EXTENSION>`; files without an extension go to the
 * destination root. Files already inside the destination are left alone.
 */

import { join } from 'node:path';
import type { MoveOldFilesRule } from '@sortwell/core';
import {
  createLogger,
  DAY_MS,
  getExtension,
  isWithin,
  listRegularFiles,
} from '@sortwell/utils';
import type { FileTransferResolver } from '../transfer/index.js';
import type { ScanContext, ScheduledStrategy } from './types.js';

const log = createLogger({ component: 'seiri' });

export interface AgeScanSummary {
  examined: number;
  moved: number;
  failed: number;
}

export class AgeBasedMoveStrategy implements ScheduledStrategy {
  readonly name = 'age-based-move';

  constructor(
    private readonly rule: MoveOldFilesRule,
    private readonly resolver: FileTransferResolver
  ) {}

  async execute(context: ScanContext): Promise<void> {
    await this.run(context);
  }

  /**
   * One pass over every monitored folder
   */
  async run(context: ScanContext): Promise<AgeScanSummary> {
    const summary: AgeScanSummary = { examined: 0, moved: 0, failed: 0 };

    if (!this.rule.enabled) {
      log.info('Old-file rule is disabled');
      return summary;
    }

    const thresholdMs = this.rule.days * DAY_MS;
    const now = context.startedAt.getTime();
    const destination = this.rule.destination;

    log.info({ days: this.rule.days }, 'Looking for files not modified recently');

    for (const folder of context.monitorFolders) {
      if (context.signal.aborted) {
        break;
      }

      const files = await listRegularFiles(folder, {
        signal: context.signal,
        skipDirectory: (dir) => isWithin(destination, dir),
        onError: (path, error) => log.error({ err: error, path }, 'Cannot read directory'),
      });

      for (const file of files) {
        if (context.signal.aborted) {
          break;
        }
        if (isWithin(destination, file.path)) {
          continue;
        }

        summary.examined++;
        if (now - file.stats.mtimeMs <= thresholdMs) {
          continue;
        }

        const extension = getExtension(file.path);
        const target = extension ? join(destination, extension.toUpperCase()) : destination;

        log.info({ path: file.path }, 'File is stale; moving');
        const result = await this.resolver.move(file.path, target);
        if (result.status === 'moved') {
          summary.moved++;
        } else if (result.status === 'failed') {
          summary.failed++;
        }
      }
    }

    log.info(summary, 'Old-file pass finished');
    return summary;
  }
}
