import ts from "typescript";
import { createIssue } from "../auditor/issue-factory.js";
import { Severity } from "../auditor/types.js";
import type { Issue } from "../auditor/types.js";
import { lineOf } from "../parser/source-parser.js";
import {
  enclosingFunction,
  indexDefinitions,
} from "./function-definitions.js";
import type { AuditRule, RuleContext } from "./types.js";

export const ERROR_HANDLING = "ERROR_HANDLING";

export const errorHandlingRule: AuditRule = {
  id: ERROR_HANDLING,
  description:
    "Catch clauses narrow the caught error (instanceof) or rethrow it instead of handling every error alike.",
  check(context: RuleContext): Issue[] {
    const index = indexDefinitions(context.functions);
    const issues: Issue[] = [];

    const visit = (node: ts.Node): void => {
      if (ts.isCatchClause(node) && !filtersErrorType(node)) {
        const owner = enclosingFunction(node, index);
        const skipped =
          owner.definition?.isPrivate === true && context.config.skip_private;
        if (owner.inFunction && !skipped) {
          const name = owner.definition?.name ?? "<anonymous>";
          issues.push(
            createIssue(
              context.file,
              lineOf(context.sourceFile, node.getStart(context.sourceFile)),
              ERROR_HANDLING,
              Severity.Warning,
              `Function '${name}' has a catch clause that handles every error alike. Narrow it with instanceof or rethrow.`,
            ),
          );
        }
      }
      ts.forEachChild(node, visit);
    };

    visit(context.sourceFile);
    return issues;
  },
};

/**
 * A catch clause filters when its block tests the caught binding with
 * `instanceof` or rethrows it. Nested functions do not count.
 */
function filtersErrorType(clause: ts.CatchClause): boolean {
  const declaration = clause.variableDeclaration;
  if (!declaration || !ts.isIdentifier(declaration.name)) {
    return false;
  }
  const bound = declaration.name.text;
  let filters = false;

  const visit = (node: ts.Node): void => {
    if (filters || ts.isFunctionLike(node)) {
      return;
    }
    if (
      ts.isBinaryExpression(node) &&
      node.operatorToken.kind === ts.SyntaxKind.InstanceOfKeyword &&
      isBinding(node.left, bound)
    ) {
      filters = true;
      return;
    }
    if (
      ts.isThrowStatement(node) &&
      isBinding(node.expression, bound)
    ) {
      filters = true;
      return;
    }
    ts.forEachChild(node, visit);
  };

  visit(clause.block);
  return filters;
}

function isBinding(expression: ts.Expression, name: string): boolean {
  let current = expression;
  while (ts.isParenthesizedExpression(current)) {
    current = current.expression;
  }
  return ts.isIdentifier(current) && current.text === name;
}
