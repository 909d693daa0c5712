import fs from "node:fs/promises";
import path from "node:path";
import { simpleGit } from "simple-git";
import type { FileEntry } from "./types.js";
import { toRelativePosix } from "./file-discovery.js";

/**
 * Root-relative paths of files that differ from the merge base of
 * `diffBase` and HEAD, including uncommitted and untracked files.
 */
export async function listChangedFiles(
  rootPath: string,
  diffBase: string,
): Promise<Set<string>> {
  const git = simpleGit({ baseDir: rootPath });
  const isRepo = await git.checkIsRepo();
  if (!isRepo) {
    throw new Error("diff-base requires a git repository target");
  }

  const mergeBase = (await git.raw(["merge-base", diffBase, "HEAD"])).trim();
  if (!mergeBase) {
    throw new Error(`Unable to resolve diff base: ${diffBase}`);
  }

  const topLevel = await fs.realpath(
    (await git.revparse(["--show-toplevel"])).trim(),
  );
  const realRoot = await fs.realpath(rootPath);
  const diff = await git.raw(["diff", "--name-only", mergeBase]);
  const status = await git.status();

  const changed = new Set<string>();
  for (const repoPath of [...splitLines(diff), ...status.not_added]) {
    const absolutePath = path.join(topLevel, repoPath);
    const relativePath = toRelativePosix(realRoot, absolutePath);
    if (!relativePath.startsWith("..")) {
      changed.add(relativePath);
    }
  }
  return changed;
}

export function filterChanged(
  files: readonly FileEntry[],
  changed: ReadonlySet<string>,
): FileEntry[] {
  return files.filter(
    (file) => file.failure !== undefined || changed.has(file.relativePath),
  );
}

function splitLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
