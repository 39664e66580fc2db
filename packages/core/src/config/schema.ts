/**
 * Configuration Schema
 * 
 * Zod schemas for the JSON configuration file. Field names follow the file
 * format; parsed values are normalized (extensions lowercased without a dot,
 * keep strategy uppercased).
 */

import { z } from 'zod';

export const timeUnitSchema = z.enum(['MILLISECONDS', 'SECONDS', 'MINUTES', 'HOURS', 'DAYS']);

const nonBlank = z.string().trim().min(1, 'must not be blank');

const extensionSchema = nonBlank.transform((ext) => ext.replace(/^\./, '').toLowerCase());

export const seitonRuleSchema = z.object({
  name: nonBlank,
  extensions: z.array(extensionSchema).min(1, 'at least one extension is required'),
  destination: nonBlank,
});

const taskScheduleShape = {
  enabled: z.boolean().default(false),
  initialDelay: z.number().int().nonnegative().default(0),
  period: z.number().positive().default(60),
  timeUnit: timeUnitSchema.default('MINUTES'),
};

export const moveOldFilesRuleSchema = z.object({
  enabled: z.boolean().default(true),
  days: z.number().nonnegative(),
  destination: z.string().trim().default(''),
});

export const seiriConfigSchema = z.object({
  ...taskScheduleShape,
  rules: z.object({
    moveFilesNotAccessedForDays: moveOldFilesRuleSchema.optional(),
  }).default({}),
});

export const cleanTempFoldersRuleSchema = z.object({
  enabled: z.boolean().default(true),
  folders: z.array(nonBlank).default([]),
});

export const seisoConfigSchema = z.object({
  ...taskScheduleShape,
  rules: z.object({
    cleanTemporaryFolders: cleanTempFoldersRuleSchema.optional(),
  }).default({}),
});

export const keepStrategySchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
  z.enum(['NEWEST', 'OLDEST', 'MANUAL'])
);

export const duplicateRulesSchema = z.object({
  minFileSizeBytes: z.number().int().nonnegative().default(0),
  maxFileSizeBytes: z.number().int().nonnegative().default(0),
  autoRemove: z.boolean().default(false),
  duplicatesDestination: z.string().trim().default(''),
  keepStrategy: keepStrategySchema.default('NEWEST'),
});

export const duplicateDetectionConfigSchema = z.object({
  ...taskScheduleShape,
  rules: duplicateRulesSchema.default({}),
});

const disabled = { enabled: false };

export const configurationSchema = z.object({
  monitorFolders: z.array(nonBlank).min(1, 'at least one folder must be monitored'),
  seitonRules: z.array(seitonRuleSchema).default([]),
  seiriConfig: seiriConfigSchema.default(disabled),
  seisoConfig: seisoConfigSchema.default(disabled),
  duplicateDetectionConfig: duplicateDetectionConfigSchema.default(disabled),
}).superRefine((config, ctx) => {
  const seiri = config.seiriConfig;
  if (seiri.enabled) {
    const rule = seiri.rules.moveFilesNotAccessedForDays;
    if (!rule) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['seiriConfig', 'rules', 'moveFilesNotAccessedForDays'],
        message: 'required when seiriConfig is enabled',
      });
    } else if (rule.enabled && rule.destination === '') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['seiriConfig', 'rules', 'moveFilesNotAccessedForDays', 'destination'],
        message: 'must not be blank when the rule is enabled',
      });
    }
  }

  const seiso = config.seisoConfig;
  if (seiso.enabled && !seiso.rules.cleanTemporaryFolders) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['seisoConfig', 'rules', 'cleanTemporaryFolders'],
      message: 'required when seisoConfig is enabled',
    });
  }

  const dup = config.duplicateDetectionConfig.rules;
  if (dup.maxFileSizeBytes > 0 && dup.minFileSizeBytes > dup.maxFileSizeBytes) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['duplicateDetectionConfig', 'rules', 'maxFileSizeBytes'],
      message: 'must not be smaller than minFileSizeBytes',
    });
  }
});

export type ConfigurationInput = z.input<typeof configurationSchema>;
