/**
 * Daemon Logger
 */

import { createLogger } from '@sortwell/utils';

export const logger = createLogger({ component: 'daemon' });
