import { AUDIT_ERROR_RULE, Severity } from "./types.js";
import type { Issue } from "./types.js";

export function createIssue(
  file: string,
  line: number,
  rule: string,
  severity: Severity,
  message: string,
): Issue {
  return Object.freeze({
    file,
    line: line > 0 ? line : 0,
    rule,
    severity,
    message,
  });
}

export function createAuditError(
  file: string,
  prefix: string,
  error: unknown,
): Issue {
  return createIssue(
    file,
    0,
    AUDIT_ERROR_RULE,
    Severity.Error,
    `${prefix}: ${errorMessage(error)}`,
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
