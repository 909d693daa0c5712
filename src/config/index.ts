export { loadConfig, mergeConfig } from "./config-loader.js";
export {
  assertConsistentConfig,
  parseSeverity,
  validateConfig,
} from "./config-validator.js";
export { CONFIG_FILE_NAME, DEFAULT_CONFIG } from "./defaults.js";
export type { AuditConfig, AuditConfigOverrides, ExcludeConfig } from "./types.js";
export type { LoadConfigOptions, LoadedConfig } from "./config-loader.js";
