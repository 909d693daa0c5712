import type { Severity } from "../auditor/types.js";

export interface ExcludeConfig {
  /** Substrings of the root-relative path; a match skips the file. */
  readonly paths: readonly string[];
  /** Substrings of the file name; a match skips the file. */
  readonly filenames: readonly string[];
}

export interface AuditConfig {
  readonly function_length: number;
  readonly module_warning_lines: number;
  readonly module_error_lines: number;
  readonly entry_point: string;
  readonly business_logic_pattern: string;
  readonly contract_markers: readonly string[];
  readonly extensions: readonly string[];
  readonly exclude: ExcludeConfig;
  readonly skip_private: boolean;
  readonly fail_on: Severity;
  readonly disabled_rules: readonly string[];
}

export type AuditConfigOverrides = {
  readonly [K in keyof AuditConfig]?: AuditConfig[K] extends ExcludeConfig
    ? Partial<ExcludeConfig>
    : AuditConfig[K];
};
