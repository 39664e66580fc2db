/**
 * Configuration Loader
 * 
 * Reads the JSON configuration file, validates it with zod, resolves relative
 * paths against the file's directory and checks that every monitored folder
 * is an existing directory. The result is deeply frozen.
 */

import { readFile, stat } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { ZodIssue } from 'zod';
import { createLogger, errorCode } from '@sortwell/utils';
import { ConfigurationError } from '../errors/index.js';
import type { Configuration } from '../types/config.js';
import { configurationSchema } from './schema.js';

const log = createLogger({ component: 'config' });

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate an already-parsed JSON document.
 * Relative paths are resolved against `baseDir`.
 */
export function parseConfiguration(
  raw: unknown,
  baseDir: string,
  source = 'configuration'
): Configuration {
  const result = configurationSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(source, result.error.issues.map(formatIssue));
  }

  const parsed = result.data;
  const abs = (p: string) => (p === '' ? p : resolve(baseDir, p));
  const moveRule = parsed.seiriConfig.rules.moveFilesNotAccessedForDays;
  const cleanRule = parsed.seisoConfig.rules.cleanTemporaryFolders;

  const config: Configuration = {
    monitorFolders: parsed.monitorFolders.map(abs),
    seitonRules: parsed.seitonRules.map((rule) => ({
      name: rule.name,
      extensions: [...new Set(rule.extensions)],
      destination: abs(rule.destination),
    })),
    seiriConfig: {
      ...parsed.seiriConfig,
      rules: moveRule
        ? { moveFilesNotAccessedForDays: { ...moveRule, destination: abs(moveRule.destination) } }
        : {},
    },
    seisoConfig: {
      ...parsed.seisoConfig,
      rules: cleanRule
        ? { cleanTemporaryFolders: { ...cleanRule, folders: cleanRule.folders.map(abs) } }
        : {},
    },
    duplicateDetectionConfig: {
      ...parsed.duplicateDetectionConfig,
      rules: {
        ...parsed.duplicateDetectionConfig.rules,
        duplicatesDestination: abs(parsed.duplicateDetectionConfig.rules.duplicatesDestination),
      },
    },
  };

  if (config.seitonRules.length === 0) {
    log.warn('No seitonRules configured; real-time organization will not move anything');
  }

  return deepFreeze(config);
}

/**
 * Check that every monitored folder exists and is a directory
 */
export async function validateMonitorFolders(
  config: Configuration,
  source = 'configuration'
): Promise<void> {
  const issues: string[] = [];

  for (const folder of config.monitorFolders) {
    try {
      const stats = await stat(folder);
      if (!stats.isDirectory()) {
        issues.push(`monitorFolders: not a directory: ${folder}`);
      }
    } catch (error) {
      issues.push(`monitorFolders: cannot access ${folder} (${errorCode(error) ?? 'unknown error'})`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(source, issues);
  }
}

/**
 * Load, validate and freeze the configuration file at `filePath`
 */
export async function loadConfiguration(filePath: string): Promise<Configuration> {
  const absolutePath = resolve(filePath);
  log.info({ path: absolutePath }, 'Loading configuration');

  let text: string;
  try {
    text = await readFile(absolutePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(absolutePath, [
      `cannot read file (${errorCode(error) ?? 'unknown error'})`,
    ]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(absolutePath, [`malformed JSON: ${reason}`]);
  }

  const config = parseConfiguration(raw, dirname(absolutePath), absolutePath);
  await validateMonitorFolders(config, absolutePath);

  log.info({
    path: absolutePath,
    monitorFolders: config.monitorFolders.length,
    seitonRules: config.seitonRules.length,
  }, 'Configuration loaded');

  return config;
}
