export { buildJsonReport } from "./json-reporter.js";
export { renderTextReport } from "./text-reporter.js";
export { renderSarifReport } from "./sarif-reporter.js";
export { partitionIssues, shouldBlock } from "./report-utils.js";
export type { TextRenderOptions } from "./text-reporter.js";
export type {
  AuditReport,
  PartitionedIssues,
  ReportInput,
  SummaryCounts,
  SummaryInfo,
  TargetInfo,
  ToolInfo,
} from "./types.js";
