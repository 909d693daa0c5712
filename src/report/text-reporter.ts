import { Severity } from "../auditor/types.js";
import type { Issue } from "../auditor/types.js";
import { partitionIssues } from "./report-utils.js";
import type { AuditReport } from "./types.js";

export interface TextRenderOptions {
  readonly showSummary?: boolean;
  readonly showIssues?: boolean;
}

const RULE_WIDTH = 70;

export function renderTextReport(
  report: AuditReport,
  options: TextRenderOptions = {},
): string {
  const showSummary = options.showSummary ?? true;
  const showIssues = options.showIssues ?? true;
  const lines: string[] = [renderHeaderBlock(report)];

  if (report.issues.length === 0) {
    lines.push("No issues found. Code complies with standards.");
    return lines.join("\n");
  }

  const { errors, warnings, info } = partitionIssues(report.issues);
  if (showSummary) {
    lines.push(`Total Issues: ${report.summary.counts.total}`);
    lines.push(`  Errors: ${errors.length} (Must Fix)`);
    lines.push(`  Warnings: ${warnings.length} (Should Fix)`);
    lines.push(`  Info: ${info.length}`);
    lines.push("=".repeat(RULE_WIDTH));
  }

  if (showIssues) {
    lines.push(...renderSection("ERRORS (Must Fix):", errors));
    lines.push(...renderSection("WARNINGS (Should Fix):", warnings));
    lines.push(...renderSection("INFO:", info));
    lines.push("=".repeat(RULE_WIDTH));
  }

  lines.push(renderVerdict(report));
  return lines.join("\n");
}

function renderSection(title: string, issues: readonly Issue[]): string[] {
  if (issues.length === 0) {
    return [];
  }
  const lines = ["", title, "-".repeat(RULE_WIDTH)];
  for (const issue of issues) {
    lines.push(`  ${issue.file}:${issue.line}`);
    lines.push(`    Rule: ${issue.rule}`);
    lines.push(`    ${issue.message}`);
  }
  return lines;
}

function renderVerdict(report: AuditReport): string {
  const { counts, fail_on: failOn, should_block: blocked } = report.summary;
  if (blocked) {
    if (failOn === Severity.Error) {
      return `Audit FAILED: ${counts.error} error(s) must be fixed.`;
    }
    const blocking =
      failOn === Severity.Warning ? counts.error + counts.warning : counts.total;
    return `Audit FAILED: ${blocking} issue(s) at or above ${failOn} must be fixed.`;
  }
  if (counts.warning > 0) {
    return `Audit PASSED with ${counts.warning} warning(s) to review.`;
  }
  return "Audit PASSED: All checks passed.";
}

function renderHeaderBlock(report: AuditReport): string {
  return renderAsciiBox([
    "Code Audit Report",
    `Target: ${report.target.input}`,
    `Files scanned: ${report.target.files_scanned}`,
  ]);
}

function renderAsciiBox(content: readonly string[]): string {
  const width = Math.max(...content.map((line) => line.length));
  const border = `+${"-".repeat(width + 2)}+`;
  const body = content.map((line) => {
    const padding = " ".repeat(width - line.length);
    return `| ${line}${padding} |`;
  });
  return [border, ...body, border].join("\n");
}
