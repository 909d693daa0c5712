import fs from "node:fs/promises";
import type { AuditConfig } from "../config/types.js";
import { parseSource } from "../parser/source-parser.js";
import { collectFunctionDefinitions } from "../rules/function-definitions.js";
import { BUILTIN_RULES } from "../rules/index.js";
import type { AuditRule, RuleContext } from "../rules/types.js";
import {
  createAuditError,
  createIssue,
} from "./issue-factory.js";
import { SYNTAX_ERROR_RULE, Severity } from "./types.js";
import type { Issue } from "./types.js";

/**
 * Audit source text that has already been read.
 *
 * A parse failure yields exactly one SYNTAX_ERROR and no rule runs. A rule
 * that throws is reported as one AUDIT_ERROR; the other rules still run.
 */
export function auditSource(
  file: string,
  text: string,
  config: AuditConfig,
  rules: readonly AuditRule[] = BUILTIN_RULES,
): Issue[] {
  const parsed = parseSource(file, text);
  if (!parsed.ok) {
    return [
      createIssue(
        file,
        parsed.line,
        SYNTAX_ERROR_RULE,
        Severity.Error,
        `Syntax error: ${parsed.message}`,
      ),
    ];
  }

  let context: RuleContext;
  try {
    context = {
      file,
      sourceFile: parsed.sourceFile,
      lines: text.split("\n"),
      config,
      functions: collectFunctionDefinitions(parsed.sourceFile),
    };
  } catch (error) {
    return [createAuditError(file, "Failed to audit file", error)];
  }

  const issues: Issue[] = [];
  for (const rule of rules) {
    try {
      issues.push(...rule.check(context));
    } catch (error) {
      issues.push(createAuditError(file, `Rule ${rule.id} failed`, error));
    }
  }
  return issues;
}

/**
 * Read and audit one file. Never rejects: a read failure becomes a single
 * AUDIT_ERROR reported against `displayPath`.
 */
export async function auditFile(
  absolutePath: string,
  displayPath: string,
  config: AuditConfig,
  rules: readonly AuditRule[] = BUILTIN_RULES,
): Promise<Issue[]> {
  let text: string;
  try {
    text = await fs.readFile(absolutePath, "utf8");
  } catch (error) {
    return [createAuditError(displayPath, "Failed to audit file", error)];
  }

  try {
    return auditSource(displayPath, text, config, rules);
  } catch (error) {
    return [createAuditError(displayPath, "Failed to audit file", error)];
  }
}
