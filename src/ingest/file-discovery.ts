import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { FileDiscoveryOptions, FileEntry } from "./types.js";

const DEFAULT_IGNORE_FILES = [".gitignore", ".codeauditignore"] as const;
const ALWAYS_IGNORED = [".git/", "node_modules/"] as const;

/** One line of an ignore file, applying below the directory that holds it. */
interface IgnoreRule {
  /** Root-relative directory of the ignore file; "" for the root. */
  readonly scope: string;
  readonly negated: boolean;
  readonly directoryOnly: boolean;
  /** Patterns without a slash match the base name at any depth. */
  readonly baseNameOnly: boolean;
  readonly matcher: RegExp;
}

interface WalkContext {
  readonly rootPath: string;
  readonly options: FileDiscoveryOptions;
  readonly ignoreFileNames: readonly string[];
  readonly visitedDirs: Set<string>;
  readonly entries: FileEntry[];
}

/**
 * Recursively find auditable files under `rootPath`, sorted by relative
 * path so that repeated runs visit files in the same order.
 *
 * Ignore files are read in every directory and apply below it. A directory
 * below the root that cannot be read becomes an entry carrying `failure`;
 * only an unreadable root rejects.
 */
export async function discoverFiles(
  rootPath: string,
  options: FileDiscoveryOptions,
): Promise<FileEntry[]> {
  const realRoot = await fs.realpath(rootPath);
  const context: WalkContext = {
    rootPath: realRoot,
    options,
    ignoreFileNames: options.ignoreFileNames ?? DEFAULT_IGNORE_FILES,
    visitedDirs: new Set<string>(),
    entries: [],
  };
  const builtIn = ALWAYS_IGNORED.flatMap(
    (line) => compileIgnoreRule(line, "") ?? [],
  );

  await walkDirectory(context, realRoot, builtIn);

  return context.entries.sort((a, b) =>
    compareText(a.relativePath, b.relativePath),
  );
}

/**
 * Whether a file with this root-relative path is audited: its extension is
 * one of `extensions` and neither exclusion list matches.
 */
export function isAuditable(
  relativePath: string,
  options: FileDiscoveryOptions,
): boolean {
  const normalized = relativePath.split(path.sep).join(path.posix.sep);
  const base = path.posix.basename(normalized);
  const extension = path.posix.extname(base).toLowerCase();
  if (!options.extensions.includes(extension)) {
    return false;
  }
  if (options.exclude.filenames.some((pattern) => base.includes(pattern))) {
    return false;
  }
  return !options.exclude.paths.some((pattern) =>
    normalized.includes(pattern),
  );
}

export function toRelativePosix(rootPath: string, absolutePath: string): string {
  const relative = path.relative(rootPath, absolutePath);
  return relative.split(path.sep).join(path.posix.sep);
}

// Plain code-unit order keeps traversal independent of the host locale.
function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

async function walkDirectory(
  context: WalkContext,
  currentPath: string,
  inherited: readonly IgnoreRule[],
): Promise<void> {
  const scope = toRelativePosix(context.rootPath, currentPath);
  let dirents: Dirent[];
  try {
    const realCurrent = await fs.realpath(currentPath);
    if (context.visitedDirs.has(realCurrent)) {
      return;
    }
    context.visitedDirs.add(realCurrent);
    dirents = await fs.readdir(currentPath, { withFileTypes: true });
  } catch (error) {
    if (currentPath === context.rootPath) {
      throw error;
    }
    context.entries.push({
      absolutePath: currentPath,
      relativePath: scope,
      failure: error,
    });
    return;
  }

  const rules = [
    ...inherited,
    ...(await readIgnoreFiles(currentPath, scope, context.ignoreFileNames)),
  ];

  dirents.sort((a, b) => compareText(a.name, b.name));
  for (const dirent of dirents) {
    const absolutePath = path.join(currentPath, dirent.name);
    const relativePath = toRelativePosix(context.rootPath, absolutePath);
    if (isIgnored(relativePath, dirent.isDirectory(), rules)) {
      continue;
    }

    if (dirent.isSymbolicLink()) {
      await followLink(context, absolutePath, rules);
    } else if (dirent.isDirectory()) {
      await walkDirectory(context, absolutePath, rules);
    } else if (dirent.isFile()) {
      addFileEntry(context, absolutePath, relativePath);
    }
  }
}

/** Links are followed only when they resolve inside the root. */
async function followLink(
  context: WalkContext,
  linkPath: string,
  rules: readonly IgnoreRule[],
): Promise<void> {
  const resolved = await fs.realpath(linkPath).catch(() => null);
  if (!resolved || !isWithinRoot(context.rootPath, resolved)) {
    return;
  }

  const stats = await fs.stat(resolved);
  const relativePath = toRelativePosix(context.rootPath, resolved);
  if (isIgnored(relativePath, stats.isDirectory(), rules)) {
    return;
  }
  if (stats.isDirectory()) {
    await walkDirectory(context, resolved, rules);
  } else if (stats.isFile()) {
    addFileEntry(context, resolved, relativePath);
  }
}

function addFileEntry(
  context: WalkContext,
  absolutePath: string,
  relativePath: string,
): void {
  if (isAuditable(relativePath, context.options)) {
    context.entries.push({ absolutePath, relativePath });
  }
}

async function readIgnoreFiles(
  dirPath: string,
  scope: string,
  fileNames: readonly string[],
): Promise<IgnoreRule[]> {
  const rules: IgnoreRule[] = [];
  for (const fileName of fileNames) {
    // A missing ignore file contributes no rules.
    const contents = await fs
      .readFile(path.join(dirPath, fileName), "utf8")
      .catch(() => "");
    for (const line of contents.split(/\r?\n/)) {
      const rule = compileIgnoreRule(line.trim(), scope);
      if (rule) {
        rules.push(rule);
      }
    }
  }
  return rules;
}

function compileIgnoreRule(line: string, scope: string): IgnoreRule | null {
  if (!line || line.startsWith("#")) {
    return null;
  }
  const negated = line.startsWith("!");
  const body = negated ? line.slice(1) : line;
  const directoryOnly = body.endsWith("/");
  const trimmed = body.replace(/\/+$/, "");
  const glob = trimmed.replace(/^\/+/, "");
  if (!glob) {
    return null;
  }

  return {
    scope,
    negated,
    directoryOnly,
    baseNameOnly: !trimmed.includes("/"),
    matcher: new RegExp(`^${globSource(glob)}$`),
  };
}

function globSource(glob: string): string {
  let source = "";
  for (let i = 0; i < glob.length; i += 1) {
    if (glob.startsWith("**/", i)) {
      source += "(?:.*/)?";
      i += 2;
    } else if (glob.startsWith("**", i)) {
      source += ".*";
      i += 1;
    } else if (glob[i] === "*") {
      source += "[^/]*";
    } else if (glob[i] === "?") {
      source += "[^/]";
    } else {
      source += glob.charAt(i).replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
  }
  return source;
}

/** Later rules override earlier ones, so a `!pattern` can re-include a path. */
function isIgnored(
  relativePath: string,
  isDirectory: boolean,
  rules: readonly IgnoreRule[],
): boolean {
  let ignored = false;
  for (const rule of rules) {
    if (rule.directoryOnly && !isDirectory) {
      continue;
    }
    const scoped = scopedPath(relativePath, rule.scope);
    if (scoped === null) {
      continue;
    }
    const subject = rule.baseNameOnly ? path.posix.basename(scoped) : scoped;
    if (rule.matcher.test(subject)) {
      ignored = !rule.negated;
    }
  }
  return ignored;
}

function scopedPath(relativePath: string, scope: string): string | null {
  if (!scope) {
    return relativePath;
  }
  return relativePath.startsWith(`${scope}/`)
    ? relativePath.slice(scope.length + 1)
    : null;
}

function isWithinRoot(rootPath: string, targetPath: string): boolean {
  const relative = path.relative(rootPath, targetPath);
  return !relative.startsWith("..") && !path.isAbsolute(relative);
}
