import ts from "typescript";
import { createIssue } from "../auditor/issue-factory.js";
import { Severity } from "../auditor/types.js";
import type { Issue } from "../auditor/types.js";
import { lineOf } from "../parser/source-parser.js";
import {
  enclosingFunction,
  indexDefinitions,
} from "./function-definitions.js";
import type { FunctionDefinition } from "./function-definitions.js";
import type { AuditRule, RuleContext } from "./types.js";

export const GLOBAL_STATE = "GLOBAL_STATE";

const GLOBAL_OBJECTS = new Set(["globalThis", "global", "window"]);

interface MutationTarget {
  readonly name: string;
  readonly label: string;
  readonly viaGlobalObject: boolean;
}

interface Offence {
  readonly statement: ts.Node;
  readonly owner: FunctionDefinition | undefined;
  readonly labels: string[];
}

export const globalStateRule: AuditRule = {
  id: GLOBAL_STATE,
  description:
    "Functions do not reassign module-level bindings or write to the global object.",
  check(context: RuleContext): Issue[] {
    const { sourceFile } = context;
    const index = indexDefinitions(context.functions);
    const mutableBindings = moduleBindings(sourceFile, true);
    const allBindings = moduleBindings(sourceFile, false);
    const offences = new Map<ts.Node, Offence>();

    const visit = (node: ts.Node): void => {
      for (const target of mutationTargets(node, sourceFile)) {
        const owner = enclosingFunction(node, index);
        const skipped =
          owner.definition?.isPrivate === true && context.config.skip_private;
        const moduleOwned = target.viaGlobalObject
          ? !allBindings.has(target.name)
          : mutableBindings.has(target.name);
        if (
          owner.inFunction &&
          !skipped &&
          moduleOwned &&
          !isShadowed(node, target.name)
        ) {
          const statement = enclosingStatement(node);
          const offence = offences.get(statement) ?? {
            statement,
            owner: owner.definition,
            labels: [],
          };
          if (!offence.labels.includes(target.label)) {
            offence.labels.push(target.label);
          }
          offences.set(statement, offence);
        }
      }
      ts.forEachChild(node, visit);
    };

    visit(sourceFile);

    return Array.from(offences.values()).map((offence) =>
      createIssue(
        context.file,
        lineOf(sourceFile, offence.statement.getStart(sourceFile)),
        GLOBAL_STATE,
        Severity.Error,
        `Function '${offence.owner?.name ?? "<anonymous>"}' mutates module-level state (${offence.labels.join(", ")})`,
      ),
    );
  },
};

function mutationTargets(
  node: ts.Node,
  sourceFile: ts.SourceFile,
): MutationTarget[] {
  if (
    ts.isBinaryExpression(node) &&
    node.operatorToken.kind >= ts.SyntaxKind.FirstAssignment &&
    node.operatorToken.kind <= ts.SyntaxKind.LastAssignment
  ) {
    return targetsOf(node.left, sourceFile);
  }
  if (
    (ts.isPrefixUnaryExpression(node) || ts.isPostfixUnaryExpression(node)) &&
    (node.operator === ts.SyntaxKind.PlusPlusToken ||
      node.operator === ts.SyntaxKind.MinusMinusToken)
  ) {
    return targetsOf(node.operand, sourceFile);
  }
  // `for (x of items)` assigns to `x` on every iteration.
  if (
    (ts.isForOfStatement(node) || ts.isForInStatement(node)) &&
    !ts.isVariableDeclarationList(node.initializer)
  ) {
    return targetsOf(node.initializer, sourceFile);
  }
  return [];
}

function targetsOf(
  expression: ts.Expression,
  sourceFile: ts.SourceFile,
): MutationTarget[] {
  const target = unwrap(expression);
  if (ts.isIdentifier(target)) {
    return [{ name: target.text, label: target.text, viaGlobalObject: false }];
  }
  if (ts.isArrayLiteralExpression(target)) {
    return target.elements.flatMap((element) =>
      ts.isOmittedExpression(element)
        ? []
        : targetsOf(
            ts.isSpreadElement(element) ? element.expression : element,
            sourceFile,
          ),
    );
  }
  if (ts.isObjectLiteralExpression(target)) {
    return target.properties.flatMap((property) =>
      objectPatternTargets(property, sourceFile),
    );
  }
  // `[a = 1] = []` assigns to `a`; the default is not a target.
  if (
    ts.isBinaryExpression(target) &&
    target.operatorToken.kind === ts.SyntaxKind.EqualsToken
  ) {
    return targetsOf(target.left, sourceFile);
  }

  let root: ts.Expression = target;
  while (
    ts.isPropertyAccessExpression(root) ||
    ts.isElementAccessExpression(root)
  ) {
    root = unwrap(root.expression);
  }
  if (root !== target && ts.isIdentifier(root) && GLOBAL_OBJECTS.has(root.text)) {
    return [
      {
        name: root.text,
        label: target.getText(sourceFile),
        viaGlobalObject: true,
      },
    ];
  }
  return [];
}

function objectPatternTargets(
  property: ts.ObjectLiteralElementLike,
  sourceFile: ts.SourceFile,
): MutationTarget[] {
  if (ts.isShorthandPropertyAssignment(property)) {
    return targetsOf(property.name, sourceFile);
  }
  if (ts.isPropertyAssignment(property)) {
    return targetsOf(property.initializer, sourceFile);
  }
  if (ts.isSpreadAssignment(property)) {
    return targetsOf(property.expression, sourceFile);
  }
  return [];
}

function unwrap(expression: ts.Expression): ts.Expression {
  let current = expression;
  while (
    ts.isParenthesizedExpression(current) ||
    ts.isNonNullExpression(current)
  ) {
    current = current.expression;
  }
  return current;
}

function enclosingStatement(node: ts.Node): ts.Node {
  let current: ts.Node = node;
  while (!ts.isSourceFile(current.parent) && !isStatementLike(current)) {
    current = current.parent;
  }
  return current;
}

function isStatementLike(node: ts.Node): boolean {
  return (
    ts.isExpressionStatement(node) ||
    ts.isVariableStatement(node) ||
    ts.isReturnStatement(node) ||
    ts.isIfStatement(node) ||
    ts.isThrowStatement(node) ||
    ts.isIterationStatement(node, false) ||
    ts.isSwitchStatement(node) ||
    // Concise arrow bodies have no statement of their own.
    (ts.isArrowFunction(node.parent) && node.parent.body === node)
  );
}

/** True when a scope between `node` and the module declares `name`. */
function isShadowed(node: ts.Node, name: string): boolean {
  let current: ts.Node | undefined = node.parent;
  while (current && !ts.isSourceFile(current)) {
    if (declaresInScope(current, name)) {
      return true;
    }
    current = current.parent;
  }
  return false;
}

function declaresInScope(scope: ts.Node, name: string): boolean {
  if (ts.isFunctionLike(scope)) {
    if (
      scope.parameters.some((parameter) =>
        bindingNames(parameter.name).includes(name),
      )
    ) {
      return true;
    }
    if (ts.isFunctionExpression(scope) && scope.name?.text === name) {
      return true;
    }
    const body = "body" in scope ? scope.body : undefined;
    return body !== undefined && ts.isBlock(body) && varNames(body).has(name);
  }
  if (ts.isBlock(scope) || ts.isModuleBlock(scope)) {
    return lexicalNames(scope.statements).has(name);
  }
  if (ts.isCaseClause(scope) || ts.isDefaultClause(scope)) {
    return lexicalNames(scope.statements).has(name);
  }
  if (
    ts.isForStatement(scope) ||
    ts.isForInStatement(scope) ||
    ts.isForOfStatement(scope)
  ) {
    const initializer = scope.initializer;
    return (
      initializer !== undefined &&
      ts.isVariableDeclarationList(initializer) &&
      initializer.declarations.some((declaration) =>
        bindingNames(declaration.name).includes(name),
      )
    );
  }
  if (ts.isCatchClause(scope)) {
    const declaration = scope.variableDeclaration;
    return (
      declaration !== undefined &&
      bindingNames(declaration.name).includes(name)
    );
  }
  return false;
}

/**
 * Names bound at module scope. With `mutableOnly`, only `let` and `var`
 * bindings; otherwise every declaration, import and hoisted `var`.
 */
function moduleBindings(
  sourceFile: ts.SourceFile,
  mutableOnly: boolean,
): Set<string> {
  const names = varNames(sourceFile);
  for (const statement of sourceFile.statements) {
    if (ts.isVariableStatement(statement)) {
      const flags = statement.declarationList.flags;
      const immutable =
        (flags & (ts.NodeFlags.Const | ts.NodeFlags.Using)) !== 0;
      if (mutableOnly && immutable) {
        continue;
      }
      for (const declaration of statement.declarationList.declarations) {
        bindingNames(declaration.name).forEach((name) => names.add(name));
      }
      continue;
    }
    if (mutableOnly) {
      continue;
    }
    for (const name of declaredNames(statement)) {
      names.add(name);
    }
  }
  return names;
}

function lexicalNames(statements: readonly ts.Statement[]): Set<string> {
  const names = new Set<string>();
  for (const statement of statements) {
    if (ts.isVariableStatement(statement)) {
      for (const declaration of statement.declarationList.declarations) {
        bindingNames(declaration.name).forEach((name) => names.add(name));
      }
      continue;
    }
    for (const name of declaredNames(statement)) {
      names.add(name);
    }
  }
  return names;
}

function declaredNames(statement: ts.Statement): string[] {
  if (
    (ts.isFunctionDeclaration(statement) ||
      ts.isClassDeclaration(statement) ||
      ts.isEnumDeclaration(statement)) &&
    statement.name
  ) {
    return [statement.name.text];
  }
  if (ts.isImportDeclaration(statement) && statement.importClause) {
    const clause = statement.importClause;
    const names = clause.name ? [clause.name.text] : [];
    const bindings = clause.namedBindings;
    if (bindings && ts.isNamespaceImport(bindings)) {
      names.push(bindings.name.text);
    } else if (bindings) {
      names.push(...bindings.elements.map((element) => element.name.text));
    }
    return names;
  }
  if (ts.isImportEqualsDeclaration(statement)) {
    return [statement.name.text];
  }
  return [];
}

/** `var` names hoisted to the scope of `root`, not descending into functions. */
function varNames(root: ts.Node): Set<string> {
  const names = new Set<string>();
  const visit = (node: ts.Node): void => {
    if (node !== root && ts.isFunctionLike(node)) {
      return;
    }
    if (
      ts.isVariableDeclarationList(node) &&
      (node.flags & ts.NodeFlags.BlockScoped) === 0
    ) {
      for (const declaration of node.declarations) {
        bindingNames(declaration.name).forEach((name) => names.add(name));
      }
    }
    ts.forEachChild(node, visit);
  };
  visit(root);
  return names;
}

function bindingNames(name: ts.BindingName): string[] {
  if (ts.isIdentifier(name)) {
    return [name.text];
  }
  const names: string[] = [];
  for (const element of name.elements) {
    if (ts.isBindingElement(element)) {
      names.push(...bindingNames(element.name));
    }
  }
  return names;
}
