import ts from "typescript";
import { createIssue } from "../auditor/issue-factory.js";
import { Severity } from "../auditor/types.js";
import type { Issue } from "../auditor/types.js";
import type { FunctionDefinition } from "./function-definitions.js";
import type { AuditRule, RuleContext } from "./types.js";

export const DOCSTRINGS = "DOCSTRINGS";

export const docstringsRule: AuditRule = {
  id: DOCSTRINGS,
  description:
    "Every function carries a JSDoc block that documents its contract.",
  check(context: RuleContext): Issue[] {
    const issues: Issue[] = [];
    const markers = context.config.contract_markers;

    for (const definition of context.functions) {
      if (definition.isPrivate && context.config.skip_private) {
        continue;
      }

      const doc = readDocBlock(definition, context.sourceFile);
      if (!doc) {
        issues.push(
          createIssue(
            context.file,
            definition.line,
            DOCSTRINGS,
            Severity.Error,
            `Function '${definition.name}' missing doc comment`,
          ),
        );
        continue;
      }

      if (markers.length > 0 && !markers.some((marker) => doc.includes(marker))) {
        issues.push(
          createIssue(
            context.file,
            definition.line,
            DOCSTRINGS,
            Severity.Warning,
            `Function '${definition.name}' doc comment missing contract section (${markers.join("/")})`,
          ),
        );
      }
    }

    return issues;
  },
};

/**
 * Text of the last JSDoc block among the comments leading a definition,
 * with the comment delimiters and leading asterisks removed. Empty blocks
 * read as absent.
 */
export function readDocBlock(
  definition: FunctionDefinition,
  sourceFile: ts.SourceFile,
): string | null {
  const host = docHost(definition);
  const text = sourceFile.text;
  // Line comments such as lint directives may sit between the block and the definition.
  const raw = (ts.getLeadingCommentRanges(text, host.getFullStart()) ?? [])
    .filter((range) => range.kind === ts.SyntaxKind.MultiLineCommentTrivia)
    .map((range) => text.slice(range.pos, range.end))
    .filter((comment) => comment.startsWith("/**") && comment !== "/**/")
    .at(-1);
  if (raw === undefined) {
    return null;
  }

  const body = raw
    .slice(3, -2)
    .split(/\r?\n/)
    .map((line) => line.replace(/^\s*\*?\s?/, "").trimEnd())
    .join("\n")
    .trim();
  return body.length > 0 ? body : null;
}

function docHost(definition: FunctionDefinition): ts.Node {
  const binding = definition.binding;
  if (!binding) {
    return definition.node;
  }
  if (ts.isVariableDeclaration(binding)) {
    const list = binding.parent;
    if (
      ts.isVariableDeclarationList(list) &&
      ts.isVariableStatement(list.parent) &&
      list.declarations[0] === binding
    ) {
      return list.parent;
    }
  }
  return binding;
}
