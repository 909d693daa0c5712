import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from "./defaults.js";
import { assertConsistentConfig, validateConfig } from "./config-validator.js";
import type { AuditConfig, AuditConfigOverrides } from "./types.js";

export interface LoadConfigOptions {
  /** Explicit config file; it must exist. */
  readonly configPath?: string;
  /** Directories searched in order for the default config file name. */
  readonly searchDirs?: readonly string[];
}

export interface LoadedConfig {
  readonly config: AuditConfig;
  /** Config file that was applied, if any. */
  readonly source?: string;
}

/**
 * Resolve the effective config: defaults, then the config file, then
 * `overrides` (usually command-line flags).
 */
export async function loadConfig(
  options: LoadConfigOptions = {},
  overrides: AuditConfigOverrides = {},
): Promise<LoadedConfig> {
  const source = options.configPath
    ? path.resolve(options.configPath)
    : await findConfigFile(options.searchDirs ?? [process.cwd()]);

  const fromFile = source ? await readConfigFile(source) : {};
  const config = mergeConfig(mergeConfig(DEFAULT_CONFIG, fromFile), overrides);
  return { config: assertConsistentConfig(config), source };
}

export function mergeConfig(
  base: AuditConfig,
  overrides: AuditConfigOverrides,
): AuditConfig {
  return {
    function_length: overrides.function_length ?? base.function_length,
    module_warning_lines:
      overrides.module_warning_lines ?? base.module_warning_lines,
    module_error_lines: overrides.module_error_lines ?? base.module_error_lines,
    entry_point: overrides.entry_point ?? base.entry_point,
    business_logic_pattern:
      overrides.business_logic_pattern ?? base.business_logic_pattern,
    contract_markers: overrides.contract_markers ?? base.contract_markers,
    extensions: overrides.extensions ?? base.extensions,
    exclude: {
      paths: overrides.exclude?.paths ?? base.exclude.paths,
      filenames: overrides.exclude?.filenames ?? base.exclude.filenames,
    },
    skip_private: overrides.skip_private ?? base.skip_private,
    fail_on: overrides.fail_on ?? base.fail_on,
    disabled_rules: overrides.disabled_rules ?? base.disabled_rules,
  };
}

async function readConfigFile(configPath: string): Promise<AuditConfigOverrides> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch {
    throw new Error(`Config file not found: ${configPath}`);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid config format in ${configPath}: ${reason}`);
  }
  return validateConfig(doc);
}

async function findConfigFile(
  searchDirs: readonly string[],
): Promise<string | undefined> {
  for (const dir of searchDirs) {
    const candidate = path.resolve(dir, CONFIG_FILE_NAME);
    if (await isFile(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

async function isFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile();
  } catch {
    return false;
  }
}
