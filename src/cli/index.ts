/**
 * CLI Module Exports
 *
 * Re-exports the CLI commands and utilities.
 */

// Commands
export { convertCommand, buildOverrides, resolveConfig, renderSummary } from './convert.js';
export type { ConvertCliOptions } from './convert.js';

// Utilities
export {
  color,
  supportsColor,
  stripAnsi,
  createSpinner,
  formatDuration,
  formatNumber,
  formatTable,
  configFromEnv,
  readConfigFile,
  loadConfig,
  fatal,
  warn,
  parseBoolean,
  parseList,
  parseIntegerList,
  resolvePath,
} from './utils.js';

export type { LoadConfigOptions } from './utils.js';
