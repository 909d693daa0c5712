import { Severity } from "../auditor/types.js";
import type { AuditConfig } from "./types.js";

export const CONFIG_FILE_NAME = ".codeaudit.yaml";

export const DEFAULT_CONFIG: AuditConfig = {
  function_length: 50,
  module_warning_lines: 500,
  module_error_lines: 1000,
  entry_point: "main.ts",
  business_logic_pattern: "^calculate[A-Z_]",
  contract_markers: ["Contract:", "@param", "@return"],
  extensions: [".ts", ".tsx", ".mts", ".cts"],
  exclude: {
    paths: ["scripts/"],
    filenames: [".test.", ".spec.", ".d.ts"],
  },
  skip_private: true,
  fail_on: Severity.Error,
  disabled_rules: [],
};
