export { ConfigSchema, type CaseTraceConfig, type ModelTier, type OutputFormat } from './schema.js';
export { loadConfig, DEFAULT_CONFIG_FILE, type LoadConfigOptions } from './loader.js';
