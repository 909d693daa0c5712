import type { ExcludeConfig } from "../config/types.js";

export interface FileEntry {
  readonly absolutePath: string;
  /** Path relative to the audit root, with forward slashes. */
  readonly relativePath: string;
  /** Set when this path is a directory that could not be read. */
  readonly failure?: unknown;
}

export interface FileDiscoveryOptions {
  readonly extensions: readonly string[];
  readonly exclude: ExcludeConfig;
  readonly ignoreFileNames?: readonly string[];
}

export interface AuditTarget {
  /** Directory that relative paths are measured from. */
  readonly rootPath: string;
  readonly kind: "file" | "directory";
  readonly files: readonly FileEntry[];
}
