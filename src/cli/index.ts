#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import {
  parseOutputFormat,
  parseShowSection,
  runAuditCommand,
} from "./audit-command.js";
import { renderRuleList } from "./rules-command.js";

interface AuditCliOptions {
  readonly format: string;
  readonly out?: string;
  readonly config?: string;
  readonly diffBase?: string;
  readonly failOn?: string;
  readonly maxFunctionLength?: string;
  readonly entryPoint?: string;
  readonly excludePath?: string[];
  readonly excludeName?: string[];
  readonly disableRule?: string[];
  readonly show: string;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("codeaudit")
  .description("Audit TypeScript sources against structural coding standards")
  .version(toolVersion)
  .option("--verbose", "Report each audited file on stderr")
  .option("--quiet", "Print the report only when the audit fails");

program
  .command("audit")
  .argument("[target]", "File or directory to audit", ".")
  .option("--format <format>", "Output format (text|json|sarif)", "text")
  .option("--out <file>", "Write report to file")
  .option("--config <path>", "Config file (default: .codeaudit.yaml)")
  .option("--diff-base <gitref>", "Only audit files changed since this ref")
  .option("--fail-on <severity>", "Lowest severity that fails the run")
  .option("--max-function-length <lines>", "Function length limit")
  .option("--entry-point <name>", "File name that must only hold wiring")
  .option(
    "--exclude-path <substring>",
    "Skip files whose path contains this (repeatable)",
    collect,
  )
  .option(
    "--exclude-name <substring>",
    "Skip files whose name contains this (repeatable)",
    collect,
  )
  .option("--disable-rule <id>", "Do not run this rule (repeatable)", collect)
  .option("--show <section>", "Output sections (summary|issues|all)", "all")
  .action(async (target: string, options: AuditCliOptions) => {
    const globals = program.opts<{ verbose?: boolean; quiet?: boolean }>();
    try {
      const result = await runAuditCommand(
        {
          target,
          format: parseOutputFormat(options.format),
          out: options.out,
          configPath: options.config,
          diffBase: options.diffBase,
          failOn: options.failOn,
          maxFunctionLength: options.maxFunctionLength
            ? Number(options.maxFunctionLength)
            : undefined,
          entryPoint: options.entryPoint,
          excludePaths: options.excludePath,
          excludeNames: options.excludeName,
          disableRules: options.disableRule,
          show: parseShowSection(options.show),
          onFileAudited: globals.verbose
            ? (file, issues) => {
                process.stderr.write(
                  `audited ${file} (${issues.length} issue(s))\n`,
                );
              }
            : undefined,
        },
        toolVersion,
      );

      const silent = globals.quiet === true && result.exitCode === 0;
      if (!options.out && !silent) {
        await writeStdout(result.output + "\n");
      }
      process.exitCode = result.exitCode;
    } catch (error) {
      await writeError(error);
      process.exitCode = 2;
    }
  });

program
  .command("rules")
  .description("List the built-in rules")
  .action(async () => {
    await writeStdout(renderRuleList() + "\n");
  });

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json = JSON.parse(raw) as { version?: string };
  return json.version ?? "0.0.0";
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}

await program.parseAsync(process.argv);
