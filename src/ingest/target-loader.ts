import fs from "node:fs/promises";
import path from "node:path";
import { discoverFiles } from "./file-discovery.js";
import type { AuditTarget, FileDiscoveryOptions } from "./types.js";

/**
 * Resolve a file or directory into the list of files to audit.
 *
 * A single file is audited even when it would be excluded from a directory
 * walk. A missing target is the one hard failure of a run.
 */
export async function loadTarget(
  target: string,
  options: FileDiscoveryOptions,
): Promise<AuditTarget> {
  const resolvedPath = path.resolve(target);
  let stats: Awaited<ReturnType<typeof fs.stat>>;
  try {
    stats = await fs.stat(resolvedPath);
  } catch {
    throw new Error(
      `Target path does not exist: ${resolvedPath}. Provide a file or directory to audit.`,
    );
  }

  if (stats.isFile()) {
    return {
      rootPath: path.dirname(resolvedPath),
      kind: "file",
      files: [
        {
          absolutePath: resolvedPath,
          relativePath: path.basename(resolvedPath),
        },
      ],
    };
  }

  if (!stats.isDirectory()) {
    throw new Error(
      `Target path must be a file or directory: ${resolvedPath}.`,
    );
  }

  const files = await discoverFiles(resolvedPath, options);
  return {
    rootPath: await fs.realpath(resolvedPath),
    kind: "directory",
    files,
  };
}
