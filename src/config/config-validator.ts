import { Severity } from "../auditor/types.js";
import { BUILTIN_RULES } from "../rules/index.js";
import type { AuditConfig, AuditConfigOverrides, ExcludeConfig } from "./types.js";

const CONFIG_KEYS = new Set([
  "function_length",
  "module_warning_lines",
  "module_error_lines",
  "entry_point",
  "business_logic_pattern",
  "contract_markers",
  "extensions",
  "exclude",
  "skip_private",
  "fail_on",
  "disabled_rules",
]);
const EXCLUDE_KEYS = new Set(["paths", "filenames"]);

/**
 * Validate a parsed config document. Every problem is collected before
 * throwing so that one run reports all of them.
 */
export function validateConfig(input: unknown): AuditConfigOverrides {
  const errors: string[] = [];
  const config = parseConfig(input, errors);
  if (errors.length > 0) {
    throw new Error(`Invalid config: ${errors.join("; ")}`);
  }
  return config;
}

/** Cross-field checks on a fully merged config. */
export function assertConsistentConfig(config: AuditConfig): AuditConfig {
  if (config.module_warning_lines >= config.module_error_lines) {
    throw new Error(
      `Invalid config: module_warning_lines (${config.module_warning_lines}) must be below module_error_lines (${config.module_error_lines})`,
    );
  }
  return config;
}

export function parseSeverity(value: string): Severity | null {
  switch (value.trim().toUpperCase()) {
    case Severity.Error:
      return Severity.Error;
    case Severity.Warning:
      return Severity.Warning;
    case Severity.Info:
      return Severity.Info;
    default:
      return null;
  }
}

function parseConfig(input: unknown, errors: string[]): AuditConfigOverrides {
  if (input === null || input === undefined) {
    return {};
  }
  if (!isRecord(input)) {
    errors.push("config must be an object");
    return {};
  }
  assertNoExtraKeys(input, CONFIG_KEYS, "config", errors);

  return {
    function_length: parsePositiveInteger(input, "function_length", errors),
    module_warning_lines: parsePositiveInteger(
      input,
      "module_warning_lines",
      errors,
    ),
    module_error_lines: parsePositiveInteger(
      input,
      "module_error_lines",
      errors,
    ),
    entry_point: parseString(input, "entry_point", errors),
    business_logic_pattern: parsePattern(input, errors),
    contract_markers: parseStringArray(
      input.contract_markers,
      "contract_markers",
      errors,
    ),
    extensions: parseExtensions(input, errors),
    exclude: parseExclude(input.exclude, errors),
    skip_private: parseBoolean(input, "skip_private", errors),
    fail_on: parseFailOn(input, errors),
    disabled_rules: parseDisabledRules(input, errors),
  };
}

function parsePositiveInteger(
  input: Record<string, unknown>,
  key: string,
  errors: string[],
): number | undefined {
  const value = input[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    errors.push(`${key} must be a positive integer`);
    return undefined;
  }
  return value;
}

function parseString(
  input: Record<string, unknown>,
  key: string,
  errors: string[],
): string | undefined {
  const value = input[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string" || value.length === 0) {
    errors.push(`${key} must be a non-empty string`);
    return undefined;
  }
  return value;
}

function parseBoolean(
  input: Record<string, unknown>,
  key: string,
  errors: string[],
): boolean | undefined {
  const value = input[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    errors.push(`${key} must be a boolean`);
    return undefined;
  }
  return value;
}

function parsePattern(
  input: Record<string, unknown>,
  errors: string[],
): string | undefined {
  const pattern = parseString(input, "business_logic_pattern", errors);
  if (pattern === undefined) {
    return undefined;
  }
  try {
    new RegExp(pattern);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    errors.push(`business_logic_pattern is not a valid regular expression (${reason})`);
    return undefined;
  }
  return pattern;
}

function parseExtensions(
  input: Record<string, unknown>,
  errors: string[],
): string[] | undefined {
  const extensions = parseStringArray(input.extensions, "extensions", errors);
  if (!extensions) {
    return undefined;
  }
  const invalid = extensions.filter((extension) => !extension.startsWith("."));
  if (invalid.length > 0) {
    errors.push(`extensions must start with '.' (${invalid.join(", ")})`);
    return undefined;
  }
  return extensions.map((extension) => extension.toLowerCase());
}

function parseExclude(
  input: unknown,
  errors: string[],
): Partial<ExcludeConfig> | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (!isRecord(input)) {
    errors.push("exclude must be an object");
    return undefined;
  }
  assertNoExtraKeys(input, EXCLUDE_KEYS, "exclude", errors);
  return {
    paths: parseStringArray(input.paths, "exclude.paths", errors),
    filenames: parseStringArray(input.filenames, "exclude.filenames", errors),
  };
}

function parseFailOn(
  input: Record<string, unknown>,
  errors: string[],
): Severity | undefined {
  const value = input.fail_on;
  if (value === undefined) {
    return undefined;
  }
  const severity = typeof value === "string" ? parseSeverity(value) : null;
  if (!severity) {
    errors.push("fail_on must be one of error, warning, info");
    return undefined;
  }
  return severity;
}

function parseDisabledRules(
  input: Record<string, unknown>,
  errors: string[],
): string[] | undefined {
  const ids = parseStringArray(input.disabled_rules, "disabled_rules", errors);
  if (!ids) {
    return undefined;
  }
  const known = new Set(BUILTIN_RULES.map((rule) => rule.id));
  for (const id of ids) {
    if (!known.has(id)) {
      errors.push(`disabled_rules includes unknown rule '${id}'`);
    }
  }
  return ids;
}

function parseStringArray(
  input: unknown,
  path: string,
  errors: string[],
): string[] | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (!Array.isArray(input)) {
    errors.push(`${path} must be an array`);
    return undefined;
  }
  const values: string[] = [];
  input.forEach((entry: unknown, index) => {
    if (typeof entry !== "string") {
      errors.push(`${path}[${index}] must be a string`);
      return;
    }
    values.push(entry);
  });
  return values;
}

function assertNoExtraKeys(
  input: Record<string, unknown>,
  allowed: ReadonlySet<string>,
  path: string,
  errors: string[],
): void {
  for (const key of Object.keys(input)) {
    if (!allowed.has(key)) {
      errors.push(`${path} contains unsupported field '${key}'`);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
