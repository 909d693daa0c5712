import { createIssue } from "../auditor/issue-factory.js";
import { Severity } from "../auditor/types.js";
import type { Issue } from "../auditor/types.js";
import type { AuditRule, RuleContext } from "./types.js";

export const FUNCTION_LENGTH = "FUNCTION_LENGTH";

export const functionLengthRule: AuditRule = {
  id: FUNCTION_LENGTH,
  description:
    "Functions span no more lines than the configured limit (last line minus definition line).",
  check(context: RuleContext): Issue[] {
    const limit = context.config.function_length;
    const issues: Issue[] = [];

    for (const definition of context.functions) {
      if (definition.isPrivate && context.config.skip_private) {
        continue;
      }
      const length = definition.endLine - definition.line;
      if (length > limit) {
        issues.push(
          createIssue(
            context.file,
            definition.line,
            FUNCTION_LENGTH,
            Severity.Warning,
            `Function '${definition.name}' is ${length} lines (limit: ${limit}). Consider breaking it down.`,
          ),
        );
      }
    }

    return issues;
  },
};
