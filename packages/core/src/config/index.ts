export {
  configurationSchema,
  seitonRuleSchema,
  seiriConfigSchema,
  seisoConfigSchema,
  duplicateDetectionConfigSchema,
  duplicateRulesSchema,
  keepStrategySchema,
  timeUnitSchema,
  type ConfigurationInput,
} from './schema.js';

export {
  loadConfiguration,
  parseConfiguration,
  validateMonitorFolders,
} from './loader.js';
