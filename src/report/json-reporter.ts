import { Severity } from "../auditor/types.js";
import { partitionIssues, shouldBlock } from "./report-utils.js";
import type { AuditReport, ReportInput } from "./types.js";

export function buildJsonReport(input: ReportInput): AuditReport {
  const failOn = input.failOn ?? Severity.Error;
  const { errors, warnings, info } = partitionIssues(input.issues);
  return {
    tool: { name: "codeaudit", version: input.toolVersion },
    target: input.target,
    summary: {
      counts: {
        error: errors.length,
        warning: warnings.length,
        info: info.length,
        total: input.issues.length,
      },
      fail_on: failOn,
      should_block: shouldBlock(input.issues, failOn),
    },
    issues: [...errors, ...warnings, ...info],
  };
}
