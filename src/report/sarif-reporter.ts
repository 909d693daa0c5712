import {
  AUDIT_ERROR_RULE,
  SYNTAX_ERROR_RULE,
  Severity,
} from "../auditor/types.js";
import type { Issue } from "../auditor/types.js";
import { BUILTIN_RULES } from "../rules/index.js";
import type { AuditReport } from "./types.js";

type SarifLevel = "error" | "warning" | "note";

interface SarifRule {
  readonly id: string;
  readonly name: string;
  readonly shortDescription: { readonly text: string };
}

interface SarifResult {
  readonly ruleId: string;
  readonly level: SarifLevel;
  readonly message: { readonly text: string };
  readonly locations: readonly {
    readonly physicalLocation: {
      readonly artifactLocation: { readonly uri: string };
      readonly region?: { readonly startLine: number };
    };
  }[];
}

interface SarifLog {
  readonly version: "2.1.0";
  readonly $schema: string;
  readonly runs: readonly {
    readonly tool: {
      readonly driver: {
        readonly name: string;
        readonly version: string;
        readonly rules: readonly SarifRule[];
      };
    };
    readonly results: readonly SarifResult[];
  }[];
}

const RULE_DESCRIPTIONS = new Map<string, string>([
  ...BUILTIN_RULES.map((rule): [string, string] => [rule.id, rule.description]),
  [SYNTAX_ERROR_RULE, "The file could not be parsed."],
  [AUDIT_ERROR_RULE, "The file could not be audited."],
]);

export function renderSarifReport(report: AuditReport): string {
  const { rules, results } = toSarif(report.issues);
  const sarif: SarifLog = {
    version: "2.1.0",
    $schema: "https://json.schemastore.org/sarif-2.1.0.json",
    runs: [
      {
        tool: {
          driver: {
            name: "codeaudit",
            version: report.tool.version,
            rules,
          },
        },
        results,
      },
    ],
  };
  return JSON.stringify(sarif, null, 2);
}

function toSarif(issues: readonly Issue[]): {
  readonly rules: SarifRule[];
  readonly results: SarifResult[];
} {
  const rules: SarifRule[] = [];
  const seen = new Set<string>();
  const results = issues.map((issue) => {
    if (!seen.has(issue.rule)) {
      seen.add(issue.rule);
      rules.push(buildRule(issue.rule));
    }
    return buildResult(issue);
  });
  return { rules, results };
}

function buildRule(ruleId: string): SarifRule {
  return {
    id: ruleId,
    name: ruleId,
    shortDescription: { text: RULE_DESCRIPTIONS.get(ruleId) ?? ruleId },
  };
}

function buildResult(issue: Issue): SarifResult {
  return {
    ruleId: issue.rule,
    level: toSarifLevel(issue.severity),
    message: { text: issue.message },
    locations: [
      {
        physicalLocation: {
          artifactLocation: { uri: issue.file },
          // SARIF lines are 1-based; an unknown line carries no region.
          region: issue.line > 0 ? { startLine: issue.line } : undefined,
        },
      },
    ],
  };
}

function toSarifLevel(severity: Severity): SarifLevel {
  switch (severity) {
    case Severity.Error:
      return "error";
    case Severity.Warning:
      return "warning";
    case Severity.Info:
    default:
      return "note";
  }
}
