/**
 * Real-time Dispatch
 * 
 * First matching rule wins; later rules are never consulted for that file.
 */

import { createLogger, getExtension } from '@sortwell/utils';
import type { TransferResult } from '../transfer/index.js';
import type { RealtimeStrategy } from './types.js';

const log = createLogger({ component: 'seiton' });

export interface DispatchOutcome {
  strategy: RealtimeStrategy;
  // Undefined when the strategy threw
  result?: TransferResult;
}

export async function dispatchCreatedFile(
  filePath: string,
  strategies: readonly RealtimeStrategy[]
): Promise<DispatchOutcome | null> {
  const extension = getExtension(filePath);
  if (extension === null) {
    log.debug({ path: filePath }, 'No extension; skipping');
    return null;
  }

  const strategy = strategies.find((candidate) => candidate.matches(extension));
  if (!strategy) {
    log.info({ path: filePath, extension }, 'No rule matches extension');
    return null;
  }

  log.info({ path: filePath, rule: strategy.name }, 'Rule matched; moving file');

  try {
    const result = await strategy.apply(filePath);
    return { strategy, result };
  } catch (error) {
    log.error({ err: error, path: filePath, rule: strategy.name }, 'Rule failed');
    return { strategy };
  }
}
