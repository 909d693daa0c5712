import ts from "typescript";
import { createIssue } from "../auditor/issue-factory.js";
import { Severity } from "../auditor/types.js";
import type { Issue } from "../auditor/types.js";
import type { FunctionDefinition } from "./function-definitions.js";
import type { AuditRule, RuleContext } from "./types.js";

export const TYPE_HINTS = "TYPE_HINTS";

export const typeHintsRule: AuditRule = {
  id: TYPE_HINTS,
  description:
    "Every function declares its return type and the type of each parameter.",
  check(context: RuleContext): Issue[] {
    const issues: Issue[] = [];

    for (const definition of context.functions) {
      if (definition.isPrivate && context.config.skip_private) {
        continue;
      }
      // A typed binding such as `const f: Handler = (x) => x` annotates the whole function.
      if (definition.binding?.type) {
        continue;
      }

      if (requiresReturnType(definition) && !definition.node.type) {
        issues.push(
          createIssue(
            context.file,
            definition.line,
            TYPE_HINTS,
            Severity.Error,
            `Function '${definition.name}' missing return type annotation`,
          ),
        );
      }

      for (const parameter of definition.node.parameters) {
        if (parameter.type) {
          continue;
        }
        const name = parameter.name.getText(context.sourceFile);
        issues.push(
          createIssue(
            context.file,
            definition.line,
            TYPE_HINTS,
            Severity.Error,
            `Function '${definition.name}' parameter '${name}' missing type annotation`,
          ),
        );
      }
    }

    return issues;
  },
};

function requiresReturnType(definition: FunctionDefinition): boolean {
  return (
    !ts.isConstructorDeclaration(definition.node) &&
    !ts.isSetAccessorDeclaration(definition.node)
  );
}
