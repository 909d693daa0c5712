export { auditFile, auditSource } from "./file-auditor.js";
export { auditFiles, auditTarget } from "./target-auditor.js";
export { createIssue } from "./issue-factory.js";
export { AUDIT_ERROR_RULE, SYNTAX_ERROR_RULE, Severity } from "./types.js";
export type { AuditResult, Issue } from "./types.js";
export type { AuditOptions, TargetAuditResult } from "./target-auditor.js";
