/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  validateConfig,
  validateVersion,
  buildOptionsFromConfig,
  getConfigPath,
  DEFAULT_CONFIG,
  CONFIG_DIR,
  CONFIG_FILE,
} from './ConfigLoader.js';
export type { RecordcConfig, CompilerConfig } from './ConfigLoader.js';
