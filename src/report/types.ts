import type { Issue, Severity } from "../auditor/types.js";

export interface ToolInfo {
  readonly name: "codeaudit";
  readonly version: string;
}

export interface TargetInfo {
  readonly input: string;
  readonly resolved_path?: string;
  readonly files_scanned: number;
}

export interface SummaryCounts {
  error: number;
  warning: number;
  info: number;
  total: number;
}

export interface SummaryInfo {
  readonly counts: SummaryCounts;
  readonly fail_on: Severity;
  readonly should_block: boolean;
}

export interface AuditReport {
  readonly tool: ToolInfo;
  readonly target: TargetInfo;
  readonly summary: SummaryInfo;
  /** Errors first, then warnings, then info; audit order within each. */
  readonly issues: readonly Issue[];
}

export interface ReportInput {
  readonly toolVersion: string;
  readonly target: TargetInfo;
  readonly issues: readonly Issue[];
  readonly failOn?: Severity;
}

export interface PartitionedIssues {
  readonly errors: readonly Issue[];
  readonly warnings: readonly Issue[];
  readonly info: readonly Issue[];
}
