import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { simpleGit } from "simple-git";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  parseOutputFormat,
  parseShowSection,
  runAuditCommand,
} from "../../src/cli/audit-command.js";
import { renderRuleList } from "../../src/cli/rules-command.js";

const UNTYPED = "function f(x) {\n  return x;\n}\n";
const UNDOCUMENTED_CONTRACT = [
  "/** Adds two numbers. */",
  "export function add(a: number, b: number): number {",
  "  return a + b;",
  "}",
  "",
].join("\n");

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "codeaudit-cli-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("cli commands", () => {
  it("runs the audit command with json output", async () => {
    await fs.writeFile(path.join(tempDir, "util.ts"), UNTYPED, "utf8");

    const result = await runAuditCommand(
      { target: tempDir, format: "json" },
      "0.1.0",
    );

    const parsed = JSON.parse(result.output) as {
      summary: { counts: { error: number; total: number } };
      issues: Array<{ rule: string; file: string }>;
    };
    expect(result.exitCode).toBe(1);
    expect(parsed.summary.counts).toMatchObject({ error: 3, total: 3 });
    expect(parsed.issues.map((issue) => issue.rule)).toEqual([
      "TYPE_HINTS",
      "TYPE_HINTS",
      "DOCSTRINGS",
    ]);
    expect(result.report.target.files_scanned).toBe(1);
  });

  it("passes when only warnings are found", async () => {
    await fs.writeFile(path.join(tempDir, "add.ts"), UNDOCUMENTED_CONTRACT, "utf8");

    const result = await runAuditCommand(
      { target: tempDir, format: "text" },
      "0.1.0",
    );

    expect(result.exitCode).toBe(0);
    expect(result.output.split("\n").at(-1)).toBe(
      "Audit PASSED with 1 warning(s) to review.",
    );
  });

  it("fails on warnings when the threshold is lowered", async () => {
    await fs.writeFile(path.join(tempDir, "add.ts"), UNDOCUMENTED_CONTRACT, "utf8");

    const result = await runAuditCommand(
      { target: tempDir, format: "json", failOn: "warning" },
      "0.1.0",
    );

    expect(result.exitCode).toBe(1);
    expect(result.report.summary.should_block).toBe(true);
  });

  it("applies the config file found in the target directory", async () => {
    await fs.writeFile(path.join(tempDir, "util.ts"), UNTYPED, "utf8");
    await fs.writeFile(
      path.join(tempDir, ".codeaudit.yaml"),
      "disabled_rules:\n  - TYPE_HINTS\n  - DOCSTRINGS\n",
      "utf8",
    );

    const result = await runAuditCommand(
      { target: tempDir, format: "json" },
      "0.1.0",
    );

    expect(result.exitCode).toBe(0);
    expect(result.report.issues).toEqual([]);
  });

  it("lets flags disable rules and exclude files", async () => {
    await fs.mkdir(path.join(tempDir, "vendor"), { recursive: true });
    await fs.writeFile(path.join(tempDir, "vendor", "lib.ts"), UNTYPED, "utf8");
    await fs.writeFile(path.join(tempDir, "util.ts"), UNTYPED, "utf8");

    const result = await runAuditCommand(
      {
        target: tempDir,
        format: "json",
        excludePaths: ["vendor/"],
        disableRules: ["DOCSTRINGS"],
      },
      "0.1.0",
    );

    expect(result.report.target.files_scanned).toBe(1);
    expect(result.report.issues.map((issue) => [issue.file, issue.rule])).toEqual([
      ["util.ts", "TYPE_HINTS"],
      ["util.ts", "TYPE_HINTS"],
    ]);
  });

  it("writes the report to the output file", async () => {
    await fs.writeFile(path.join(tempDir, "util.ts"), UNTYPED, "utf8");
    const outPath = path.join(tempDir, "report.sarif");

    const result = await runAuditCommand(
      { target: tempDir, format: "sarif", out: outPath },
      "0.1.0",
    );

    expect(await fs.readFile(outPath, "utf8")).toBe(result.output);
    expect(result.output).toContain('"version": "2.1.0"');
  });

  it("audits only files changed since the diff base", async () => {
    const git = simpleGit({ baseDir: tempDir });
    await git.init();
    await git.addConfig("user.name", "Codeaudit Test");
    await git.addConfig("user.email", "test@example.com");

    await fs.writeFile(path.join(tempDir, "old.ts"), UNTYPED, "utf8");
    await git.add(["."]);
    await git.commit("base");

    await fs.writeFile(path.join(tempDir, "new.ts"), UNTYPED, "utf8");
    await git.add(["."]);
    await git.commit("head");

    const result = await runAuditCommand(
      { target: tempDir, format: "json", diffBase: "HEAD~1" },
      "0.1.0",
    );

    expect(result.report.target.files_scanned).toBe(1);
    expect(new Set(result.report.issues.map((issue) => issue.file))).toEqual(
      new Set(["new.ts"]),
    );
  });

  it("rejects unknown fail-on levels and bad lengths", async () => {
    await expect(
      runAuditCommand(
        { target: tempDir, format: "json", failOn: "fatal" },
        "0.1.0",
      ),
    ).rejects.toThrow(
      "Unsupported fail-on level: fatal. Use error, warning or info.",
    );
    await expect(
      runAuditCommand(
        { target: tempDir, format: "json", maxFunctionLength: 0 },
        "0.1.0",
      ),
    ).rejects.toThrow("--max-function-length must be a positive integer");
  });

  it("produces byte-identical reports for an unchanged tree", async () => {
    await fs.writeFile(path.join(tempDir, "util.ts"), UNTYPED, "utf8");
    await fs.writeFile(path.join(tempDir, "add.ts"), UNDOCUMENTED_CONTRACT, "utf8");

    for (const format of ["text", "json", "sarif"] as const) {
      const first = await runAuditCommand({ target: tempDir, format }, "0.1.0");
      const second = await runAuditCommand({ target: tempDir, format }, "0.1.0");
      expect(second.output).toBe(first.output);
    }
  });

  it("rejects unknown output formats and sections", () => {
    expect(parseOutputFormat("sarif")).toBe("sarif");
    expect(parseShowSection("summary")).toBe("summary");
    expect(() => parseOutputFormat("md")).toThrow(
      "Unsupported format: md. Use text, json or sarif.",
    );
    expect(() => parseShowSection("everything")).toThrow(
      "Unsupported show section: everything. Use summary, issues or all.",
    );
  });

  it("lists the built-in rules in run order", () => {
    const ids = renderRuleList()
      .split("\n")
      .map((line) => line.split(" ")[0]);

    expect(ids).toEqual([
      "TYPE_HINTS",
      "DOCSTRINGS",
      "FUNCTION_LENGTH",
      "GLOBAL_STATE",
      "MODULE_STRUCTURE",
      "ERROR_HANDLING",
    ]);
  });
});
