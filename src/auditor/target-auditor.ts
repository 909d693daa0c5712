import path from "node:path";
import type { AuditConfig } from "../config/types.js";
import { filterChanged, listChangedFiles } from "../ingest/changed-files.js";
import { loadTarget } from "../ingest/target-loader.js";
import type { AuditTarget, FileEntry } from "../ingest/types.js";
import { selectRules } from "../rules/index.js";
import type { AuditRule } from "../rules/types.js";
import { auditFile } from "./file-auditor.js";
import { createAuditError } from "./issue-factory.js";
import type { AuditResult, Issue } from "./types.js";

export interface AuditOptions {
  /** Only audit files changed since the merge base of this git ref and HEAD. */
  readonly diffBase?: string;
  /** Rules to run instead of the configured built-in set. */
  readonly rules?: readonly AuditRule[];
  /** Called after each file, in audit order. */
  readonly onFileAudited?: (file: string, issues: readonly Issue[]) => void;
}

export interface TargetAuditResult extends AuditResult {
  readonly target: AuditTarget;
}

/**
 * Audit a file or every auditable file under a directory.
 *
 * Files are audited one at a time in discovery order. Issue paths are
 * relative to the directory being audited (or the file name, for a single
 * file target).
 */
export async function auditTarget(
  target: string,
  config: AuditConfig,
  options: AuditOptions = {},
): Promise<TargetAuditResult> {
  const loaded = await loadTarget(target, {
    extensions: config.extensions,
    exclude: config.exclude,
  });
  const files = options.diffBase
    ? filterChanged(
        loaded.files,
        await listChangedFiles(loaded.rootPath, options.diffBase),
      )
    : loaded.files;
  const rules = options.rules ?? selectRules(config.disabled_rules);

  const result = await auditFiles(files, config, rules, options.onFileAudited);
  return { ...result, target: { ...loaded, files } };
}

export async function auditFiles(
  files: readonly FileEntry[],
  config: AuditConfig,
  rules: readonly AuditRule[],
  onFileAudited?: AuditOptions["onFileAudited"],
): Promise<AuditResult> {
  const issues: Issue[] = [];
  const scanned: string[] = [];

  for (const file of files) {
    const displayPath = file.relativePath.split(path.sep).join(path.posix.sep);
    let fileIssues: Issue[];
    if (file.failure !== undefined) {
      fileIssues = [
        createAuditError(displayPath, "Failed to read directory", file.failure),
      ];
    } else {
      try {
        fileIssues = await auditFile(
          file.absolutePath,
          displayPath,
          config,
          rules,
        );
      } catch (error) {
        fileIssues = [
          createAuditError(displayPath, "Failed to audit file", error),
        ];
      }
    }
    scanned.push(displayPath);
    issues.push(...fileIssues);
    onFileAudited?.(displayPath, fileIssues);
  }

  return { files: scanned, issues };
}
