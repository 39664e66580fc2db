/**
 * Daemon Configuration
 * 
 * Environment settings only; the organization rules live in the JSON file
 * named by SORTWELL_CONFIG (or --config).
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

// Load .env from monorepo root
dotenvConfig({ path: resolve(monorepoRoot, '.env') });

// Helper to resolve relative paths from monorepo root
function resolvePath(p: string): string {
  if (p.startsWith('./') || p.startsWith('../')) {
    return resolve(monorepoRoot, p);
  }
  return p;
}

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Rules file
  SORTWELL_CONFIG: z.string().default('./config/sortwell.json'),

  // Watcher settle delay
  SORTWELL_SETTLE_MS: z.string().transform(Number).pipe(z.number().int().nonnegative()).default('500'),

  // Scheduler grace period on shutdown
  SORTWELL_SHUTDOWN_GRACE_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('60000'),
});

export type DaemonSettings = ReturnType<typeof toSettings>;

function toSettings(env: z.infer<typeof envSchema>) {
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    configPath: resolvePath(env.SORTWELL_CONFIG),
    watcher: {
      settleMs: env.SORTWELL_SETTLE_MS,
    },
    scheduler: {
      shutdownGraceMs: env.SORTWELL_SHUTDOWN_GRACE_MS,
    },
  } as const;
}

/**
 * Parse daemon settings from an environment object
 */
export function parseSettings(source: NodeJS.ProcessEnv): DaemonSettings {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join('; ')}`);
  }

  return toSettings(parseResult.data);
}
