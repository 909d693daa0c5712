import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { simpleGit } from "simple-git";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { filterChanged, listChangedFiles } from "../../src/ingest/changed-files.js";
import { discoverFiles, isAuditable } from "../../src/ingest/file-discovery.js";
import { loadTarget } from "../../src/ingest/target-loader.js";
import type { FileDiscoveryOptions } from "../../src/ingest/types.js";

const OPTIONS: FileDiscoveryOptions = {
  extensions: [".ts", ".tsx"],
  exclude: {
    paths: ["scripts/"],
    filenames: [".test.", ".d.ts"],
  },
};

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "codeaudit-ingest-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("ingest", () => {
  it("discovers auditable files in code-unit order", async () => {
    await mkdir(path.join(tempDir, "a"));
    await writeText(path.join(tempDir, "b.ts"), "export {};\n");
    await writeText(path.join(tempDir, "a", "z.tsx"), "export {};\n");
    await writeText(path.join(tempDir, "Z.ts"), "export {};\n");
    await writeText(path.join(tempDir, "README.md"), "# Demo\n");

    const files = await discoverFiles(tempDir, OPTIONS);

    expect(files.map((file) => file.relativePath)).toEqual([
      "Z.ts",
      "a/z.tsx",
      "b.ts",
    ]);
  });

  it("applies path and filename exclusions", async () => {
    await mkdir(path.join(tempDir, "scripts"));
    await mkdir(path.join(tempDir, "src"));
    await writeText(path.join(tempDir, "scripts", "release.ts"), "export {};\n");
    await writeText(path.join(tempDir, "src", "index.ts"), "export {};\n");
    await writeText(path.join(tempDir, "src", "index.test.ts"), "export {};\n");
    await writeText(path.join(tempDir, "src", "env.d.ts"), "export {};\n");

    const files = await discoverFiles(tempDir, OPTIONS);

    expect(files.map((file) => file.relativePath)).toEqual(["src/index.ts"]);
  });

  it("respects ignore files and skips dependency folders", async () => {
    await writeText(path.join(tempDir, ".gitignore"), "generated/\n");
    await writeText(path.join(tempDir, ".codeauditignore"), "legacy.ts\n");
    await mkdir(path.join(tempDir, "generated"));
    await mkdir(path.join(tempDir, "node_modules", "dep"));
    await writeText(path.join(tempDir, "generated", "api.ts"), "export {};\n");
    await writeText(
      path.join(tempDir, "node_modules", "dep", "index.ts"),
      "export {};\n",
    );
    await writeText(path.join(tempDir, "legacy.ts"), "export {};\n");
    await writeText(path.join(tempDir, "main.ts"), "export {};\n");

    const files = await discoverFiles(tempDir, OPTIONS);

    expect(files.map((file) => file.relativePath)).toEqual(["main.ts"]);
  });

  it("applies ignore files below the root to their own directory", async () => {
    await mkdir(path.join(tempDir, "packages", "app", "out"));
    await mkdir(path.join(tempDir, "packages", "app", "src"));
    await writeText(
      path.join(tempDir, "packages", "app", ".gitignore"),
      "out/\n/local.ts\n",
    );
    await writeText(path.join(tempDir, "local.ts"), "export {};\n");
    await writeText(path.join(tempDir, "packages", "app", "local.ts"), "export {};\n");
    await writeText(
      path.join(tempDir, "packages", "app", "out", "bundle.ts"),
      "export {};\n",
    );
    await writeText(
      path.join(tempDir, "packages", "app", "src", "local.ts"),
      "export {};\n",
    );

    const files = await discoverFiles(tempDir, OPTIONS);

    expect(files.map((file) => file.relativePath)).toEqual([
      "local.ts",
      "packages/app/src/local.ts",
    ]);
  });

  it("re-includes paths with negated patterns", async () => {
    await writeText(path.join(tempDir, ".codeauditignore"), "*.ts\n!keep.ts\n");
    await writeText(path.join(tempDir, "drop.ts"), "export {};\n");
    await writeText(path.join(tempDir, "keep.ts"), "export {};\n");

    const files = await discoverFiles(tempDir, OPTIONS);

    expect(files.map((file) => file.relativePath)).toEqual(["keep.ts"]);
  });

  it("records an unreadable subdirectory and keeps walking", async () => {
    await mkdir(path.join(tempDir, "locked"));
    await writeText(path.join(tempDir, "a.ts"), "export {};\n");
    await writeText(path.join(tempDir, "locked", "inner.ts"), "export {};\n");
    await writeText(path.join(tempDir, "z.ts"), "export {};\n");
    denyDirectory("locked");

    const files = await discoverFiles(tempDir, OPTIONS);

    expect(
      files.map((file) => [file.relativePath, file.failure !== undefined]),
    ).toEqual([
      ["a.ts", false],
      ["locked", true],
      ["z.ts", false],
    ]);
  });

  it("rejects when the root itself cannot be read", async () => {
    await writeText(path.join(tempDir, "a.ts"), "export {};\n");
    denyDirectory(path.basename(tempDir));

    await expect(discoverFiles(tempDir, OPTIONS)).rejects.toThrow("EACCES");
  });

  it("skips symlink targets outside root", async () => {
    const outsideDir = await fs.mkdtemp(
      path.join(os.tmpdir(), "codeaudit-out-"),
    );
    const outsideFile = path.join(outsideDir, "outside.ts");
    await writeText(outsideFile, "export {};\n");
    await fs.symlink(outsideFile, path.join(tempDir, "outside-link.ts"));

    const files = await discoverFiles(tempDir, OPTIONS);

    expect(files).toEqual([]);
    await fs.rm(outsideDir, { recursive: true, force: true });
  });

  it("checks extensions, filenames and paths", () => {
    expect(isAuditable("src/app.ts", OPTIONS)).toBe(true);
    expect(isAuditable("src/App.TSX", OPTIONS)).toBe(true);
    expect(isAuditable("src/app.js", OPTIONS)).toBe(false);
    expect(isAuditable("src/app.test.ts", OPTIONS)).toBe(false);
    expect(isAuditable("tools/scripts/build.ts", OPTIONS)).toBe(false);
  });

  it("loads a single file target relative to its directory", async () => {
    const filePath = path.join(tempDir, "single.test.ts");
    await writeText(filePath, "export {};\n");

    const target = await loadTarget(filePath, OPTIONS);

    expect(target.kind).toBe("file");
    expect(target.rootPath).toBe(path.dirname(path.resolve(filePath)));
    expect(target.files.map((file) => file.relativePath)).toEqual([
      "single.test.ts",
    ]);
  });

  it("rejects a missing target", async () => {
    const missing = path.join(tempDir, "missing");
    await expect(loadTarget(missing, OPTIONS)).rejects.toThrow(
      `Target path does not exist: ${missing}. Provide a file or directory to audit.`,
    );
  });
});

describe("changed files", () => {
  it("lists files changed since the diff base, untracked included", async () => {
    const git = simpleGit({ baseDir: tempDir });
    await git.init();
    await git.addConfig("user.name", "Codeaudit Test");
    await git.addConfig("user.email", "test@example.com");

    await writeText(path.join(tempDir, "base.ts"), "export {};\n");
    await git.add(["."]);
    await git.commit("base");

    await mkdir(path.join(tempDir, "src"));
    await writeText(path.join(tempDir, "src", "feature.ts"), "export {};\n");
    await git.add(["."]);
    await git.commit("feature");

    await writeText(path.join(tempDir, "draft.ts"), "export {};\n");

    const changed = await listChangedFiles(tempDir, "HEAD~1");

    expect([...changed].sort()).toEqual(["draft.ts", "src/feature.ts"]);

    const files = await discoverFiles(tempDir, OPTIONS);
    expect(
      filterChanged(files, changed).map((file) => file.relativePath),
    ).toEqual(["draft.ts", "src/feature.ts"]);
  });

  it("keeps unreadable directories when filtering by changes", () => {
    const files = [
      { absolutePath: "/repo/a.ts", relativePath: "a.ts" },
      { absolutePath: "/repo/b.ts", relativePath: "b.ts" },
      {
        absolutePath: "/repo/locked",
        relativePath: "locked",
        failure: new Error("EACCES"),
      },
    ];

    const kept = filterChanged(files, new Set(["b.ts"]));

    expect(kept.map((file) => file.relativePath)).toEqual(["b.ts", "locked"]);
  });

  it("requires a git repository", async () => {
    const outsideGit = await fs.mkdtemp(path.join(os.tmpdir(), "codeaudit-nogit-"));
    try {
      await expect(listChangedFiles(outsideGit, "HEAD")).rejects.toThrow(
        "diff-base requires a git repository target",
      );
    } finally {
      await fs.rm(outsideGit, { recursive: true, force: true });
    }
  });
});

const realReaddir = fs.readdir;

function denyDirectory(name: string): void {
  vi.spyOn(fs, "readdir").mockImplementation(async (target, options) => {
    if (path.basename(String(target)) === name) {
      throw Object.assign(
        new Error(`EACCES: permission denied, scandir '${name}'`),
        { code: "EACCES" },
      );
    }
    return realReaddir(target, options);
  });
}

async function writeText(filePath: string, contents: string): Promise<void> {
  await fs.writeFile(filePath, contents, "utf8");
}

async function mkdir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}
