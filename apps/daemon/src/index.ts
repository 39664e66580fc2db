#!/usr/bin/env node
/**
 * Daemon Entry Point
 * 
 * Loads the rules file, starts the organizer engine and keeps it running
 * until SIGINT/SIGTERM. With --once, runs the scheduled families a single
 * time and exits without watching.
 */

import { Command, InvalidArgumentError } from 'commander';
import { ConfigurationError, loadConfiguration, type TaskFamily } from '@sortwell/core';
import { OrganizerEngine } from '@sortwell/organizer';
import { parseSettings } from './config/index.js';
import { logger } from './lib/logger.js';

const FAMILIES: readonly TaskFamily[] = ['seiri', 'seiso', 'duplicates'];

function parseFamily(value: string): TaskFamily {
  const family = FAMILIES.find((candidate) => candidate === value);
  if (!family) {
    throw new InvalidArgumentError(`Expected one of: ${FAMILIES.join(', ')}`);
  }
  return family;
}

interface DaemonOptions {
  config?: string;
  once?: TaskFamily | true;
}

// Force exit if shutdown hangs past the scheduler's own grace period
const FORCE_EXIT_MARGIN_MS = 5000;

async function main(options: DaemonOptions): Promise<void> {
  const settings = parseSettings(process.env);
  const configPath = options.config ?? settings.configPath;

  let engine: OrganizerEngine;
  try {
    const config = await loadConfiguration(configPath);
    engine = new OrganizerEngine(config, {
      settleMs: settings.watcher.settleMs,
      shutdownGraceMs: settings.scheduler.shutdownGraceMs,
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal({ source: error.details?.['source'], issues: error.issues }, 'Invalid configuration');
    } else {
      logger.fatal({ err: error }, 'Could not load configuration');
    }
    process.exit(1);
  }

  if (options.once !== undefined) {
    const family = options.once === true ? undefined : options.once;
    logger.info({ family: family ?? 'all' }, 'Running scheduled tasks once');
    await engine.runOnce(family);
    return;
  }

  let isShuttingDown = false;

  const shutdown = async (signal: string) => {
    if (isShuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress');
      return;
    }
    isShuttingDown = true;

    logger.info({ signal }, 'Shutdown signal received');

    const forceExitTimeout = setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, settings.scheduler.shutdownGraceMs + FORCE_EXIT_MARGIN_MS);
    forceExitTimeout.unref();

    const result = await engine.stop();
    clearTimeout(forceExitTimeout);
    logger.info({ forced: result.forced }, 'Graceful shutdown complete');
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    void shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    void shutdown('unhandledRejection');
  });

  await engine.start();

  // The watch loop can end on its own (fatal watch failure); stop the scheduler too
  await engine.stop();
  logger.info('Sortwell stopped');
}

const program = new Command();

program
  .name('sortwell')
  .description('Keeps monitored folders organized')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to the JSON rules file')
  .option('--once [family]', `Run scheduled tasks once and exit (${FAMILIES.join(', ')})`, parseFamily)
  .action(async (options: DaemonOptions) => {
    await main(options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.fatal({ err: error }, 'Sortwell failed');
  process.exit(1);
});
