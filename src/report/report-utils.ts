import { Severity } from "../auditor/types.js";
import type { Issue } from "../auditor/types.js";
import type { PartitionedIssues } from "./types.js";

const SEVERITY_RANK: Record<Severity, number> = {
  [Severity.Info]: 0,
  [Severity.Warning]: 1,
  [Severity.Error]: 2,
};

export function partitionIssues(issues: readonly Issue[]): PartitionedIssues {
  return {
    errors: issues.filter((issue) => issue.severity === Severity.Error),
    warnings: issues.filter((issue) => issue.severity === Severity.Warning),
    info: issues.filter((issue) => issue.severity === Severity.Info),
  };
}

/**
 * Whether a run should block the workflow that invoked it: true when any
 * issue is at or above `failOn`.
 */
export function shouldBlock(
  issues: readonly Issue[],
  failOn: Severity = Severity.Error,
): boolean {
  const threshold = SEVERITY_RANK[failOn];
  return issues.some((issue) => SEVERITY_RANK[issue.severity] >= threshold);
}
