import path from "node:path";
import { createIssue } from "../auditor/issue-factory.js";
import { Severity } from "../auditor/types.js";
import type { Issue } from "../auditor/types.js";
import type { AuditRule, RuleContext } from "./types.js";

export const MODULE_STRUCTURE = "MODULE_STRUCTURE";

export const moduleStructureRule: AuditRule = {
  id: MODULE_STRUCTURE,
  description:
    "The entry point only wires modules together, and no module grows past the size limits.",
  check(context: RuleContext): Issue[] {
    return [...checkEntryPoint(context), ...checkModuleSize(context)];
  },
};

function checkEntryPoint(context: RuleContext): Issue[] {
  const { entry_point: entryPoint, business_logic_pattern: pattern } =
    context.config;
  if (path.basename(context.file) !== entryPoint) {
    return [];
  }

  const matcher = new RegExp(pattern);
  return context.functions
    .filter((definition) => matcher.test(definition.name))
    .map((definition) =>
      createIssue(
        context.file,
        definition.line,
        MODULE_STRUCTURE,
        Severity.Error,
        `${entryPoint} should only contain wiring, not business logic (found '${definition.name}')`,
      ),
    );
}

function checkModuleSize(context: RuleContext): Issue[] {
  const { module_error_lines: errorLimit, module_warning_lines: warningLimit } =
    context.config;
  const count = context.lines.length;

  if (count > errorLimit) {
    return [
      createIssue(
        context.file,
        1,
        MODULE_STRUCTURE,
        Severity.Error,
        `File is ${count} lines (limit: ${errorLimit}). Refactor immediately.`,
      ),
    ];
  }
  if (count > warningLimit) {
    return [
      createIssue(
        context.file,
        1,
        MODULE_STRUCTURE,
        Severity.Warning,
        `File is ${count} lines (limit: ${warningLimit}). Consider splitting.`,
      ),
    ];
  }
  return [];
}
