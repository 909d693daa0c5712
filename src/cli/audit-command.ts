import fs from "node:fs/promises";
import path from "node:path";
import { auditTarget } from "../auditor/target-auditor.js";
import type { Issue } from "../auditor/types.js";
import { loadConfig } from "../config/config-loader.js";
import { parseSeverity } from "../config/config-validator.js";
import type { AuditConfigOverrides } from "../config/types.js";
import { buildJsonReport } from "../report/json-reporter.js";
import { renderSarifReport } from "../report/sarif-reporter.js";
import {
  renderTextReport,
  type TextRenderOptions,
} from "../report/text-reporter.js";
import type { AuditReport } from "../report/types.js";

export type OutputFormat = "text" | "json" | "sarif";
export type ShowSection = "summary" | "issues" | "all";

export interface AuditCommandOptions {
  readonly target: string;
  readonly format: OutputFormat;
  readonly out?: string;
  readonly configPath?: string;
  readonly diffBase?: string;
  readonly failOn?: string;
  readonly maxFunctionLength?: number;
  readonly entryPoint?: string;
  readonly excludePaths?: readonly string[];
  readonly excludeNames?: readonly string[];
  readonly disableRules?: readonly string[];
  readonly show?: ShowSection;
  readonly onFileAudited?: (file: string, issues: readonly Issue[]) => void;
}

export interface AuditCommandResult {
  readonly report: AuditReport;
  readonly output: string;
  readonly exitCode: number;
}

export async function runAuditCommand(
  options: AuditCommandOptions,
  toolVersion: string,
): Promise<AuditCommandResult> {
  const { config } = await loadConfig(
    {
      configPath: options.configPath,
      searchDirs: await configSearchDirs(options.target),
    },
    buildOverrides(options),
  );

  const result = await auditTarget(options.target, config, {
    diffBase: options.diffBase,
    onFileAudited: options.onFileAudited,
  });

  const report = buildJsonReport({
    toolVersion,
    target: {
      input: options.target,
      resolved_path: result.target.rootPath,
      files_scanned: result.files.length,
    },
    issues: result.issues,
    failOn: config.fail_on,
  });

  const output = buildOutput(report, options);
  if (options.out) {
    await fs.writeFile(options.out, output, "utf8");
  }

  return {
    report,
    output,
    exitCode: report.summary.should_block ? 1 : 0,
  };
}

export function parseOutputFormat(value: string): OutputFormat {
  if (value === "text" || value === "json" || value === "sarif") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}. Use text, json or sarif.`);
}

export function parseShowSection(value: string): ShowSection {
  if (value === "summary" || value === "issues" || value === "all") {
    return value;
  }
  throw new Error(`Unsupported show section: ${value}. Use summary, issues or all.`);
}

function buildOverrides(options: AuditCommandOptions): AuditConfigOverrides {
  let failOn: AuditConfigOverrides["fail_on"];
  if (options.failOn !== undefined) {
    const parsed = parseSeverity(options.failOn);
    if (!parsed) {
      throw new Error(
        `Unsupported fail-on level: ${options.failOn}. Use error, warning or info.`,
      );
    }
    failOn = parsed;
  }

  const maxLength = options.maxFunctionLength;
  if (
    maxLength !== undefined &&
    (!Number.isInteger(maxLength) || maxLength < 1)
  ) {
    throw new Error("--max-function-length must be a positive integer");
  }

  return {
    fail_on: failOn,
    function_length: maxLength,
    entry_point: options.entryPoint,
    exclude:
      options.excludePaths || options.excludeNames
        ? { paths: options.excludePaths, filenames: options.excludeNames }
        : undefined,
    disabled_rules: options.disableRules,
  };
}

async function configSearchDirs(target: string): Promise<string[]> {
  const resolved = path.resolve(target);
  // A missing target is reported by auditTarget.
  const stats = await fs.stat(resolved).catch(() => null);
  const targetDir = stats?.isFile() ? path.dirname(resolved) : resolved;
  return Array.from(new Set([targetDir, process.cwd()]));
}

function buildOutput(report: AuditReport, options: AuditCommandOptions): string {
  if (options.format === "json") {
    return JSON.stringify(report, null, 2);
  }
  if (options.format === "sarif") {
    return renderSarifReport(report);
  }
  return renderTextReport(report, buildTextOptions(options));
}

function buildTextOptions(options: AuditCommandOptions): TextRenderOptions {
  const show = options.show ?? "all";
  return {
    showSummary: show === "summary" || show === "all",
    showIssues: show === "issues" || show === "all",
  };
}
