export const enum Severity {
  Error = "ERROR",
  Warning = "WARNING",
  Info = "INFO",
}

export interface Issue {
  readonly file: string;
  readonly line: number;
  readonly rule: string;
  readonly severity: Severity;
  readonly message: string;
}

export interface AuditResult {
  readonly files: readonly string[];
  readonly issues: readonly Issue[];
}

/** Rule ids produced by the auditor itself rather than by a rule. */
export const SYNTAX_ERROR_RULE = "SYNTAX_ERROR";
export const AUDIT_ERROR_RULE = "AUDIT_ERROR";
