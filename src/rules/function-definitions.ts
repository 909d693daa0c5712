import ts from "typescript";
import { lineOf } from "../parser/source-parser.js";

export type FunctionDefinitionNode =
  | ts.FunctionDeclaration
  | ts.MethodDeclaration
  | ts.ConstructorDeclaration
  | ts.GetAccessorDeclaration
  | ts.SetAccessorDeclaration
  | ts.ArrowFunction
  | ts.FunctionExpression;

export interface FunctionDefinition {
  readonly node: FunctionDefinitionNode;
  readonly name: string;
  /** Variable or property the function is bound to, when it is not a declaration itself. */
  readonly binding?: ts.VariableDeclaration | ts.PropertyDeclaration;
  readonly line: number;
  readonly endLine: number;
  readonly isPrivate: boolean;
}

/**
 * Collect every function definition in source order.
 *
 * Inline callbacks are not definitions; only functions that are declared,
 * or bound directly to a variable or class property, are returned.
 */
export function collectFunctionDefinitions(
  sourceFile: ts.SourceFile,
): FunctionDefinition[] {
  const definitions: FunctionDefinition[] = [];

  const visit = (node: ts.Node): void => {
    const definition = toDefinition(node, sourceFile);
    if (definition) {
      definitions.push(definition);
    }
    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return definitions;
}

function toDefinition(
  node: ts.Node,
  sourceFile: ts.SourceFile,
): FunctionDefinition | null {
  if (
    ts.isFunctionDeclaration(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node)
  ) {
    if (!node.body) {
      return null;
    }
    const name = node.name
      ? propertyNameText(node.name, sourceFile)
      : "default";
    const prefix = ts.isGetAccessorDeclaration(node)
      ? "get "
      : ts.isSetAccessorDeclaration(node)
        ? "set "
        : "";
    return build(node, `${prefix}${name}`, node.name ?? node, sourceFile, {
      isPrivate: isPrivateName(node.name, name) || hasPrivateModifier(node),
    });
  }

  if (ts.isConstructorDeclaration(node)) {
    if (!node.body) {
      return null;
    }
    const keyword = node.getFirstToken(sourceFile) ?? node;
    return build(node, "constructor", keyword, sourceFile, {
      isPrivate: hasPrivateModifier(node),
    });
  }

  if (ts.isArrowFunction(node) || ts.isFunctionExpression(node)) {
    const parent = node.parent;
    if (
      (ts.isVariableDeclaration(parent) || ts.isPropertyDeclaration(parent)) &&
      parent.initializer === node
    ) {
      const name = propertyNameText(parent.name, sourceFile);
      return build(node, name, parent.name, sourceFile, {
        binding: parent,
        isPrivate:
          isPrivateName(parent.name, name) ||
          (ts.isPropertyDeclaration(parent) && hasPrivateModifier(parent)),
      });
    }
  }

  return null;
}

function build(
  node: FunctionDefinitionNode,
  name: string,
  anchor: ts.Node,
  sourceFile: ts.SourceFile,
  extra: {
    readonly isPrivate: boolean;
    readonly binding?: ts.VariableDeclaration | ts.PropertyDeclaration;
  },
): FunctionDefinition {
  return {
    node,
    name,
    binding: extra.binding,
    line: lineOf(sourceFile, anchor.getStart(sourceFile)),
    endLine: lineOf(sourceFile, node.getEnd()),
    isPrivate: extra.isPrivate,
  };
}

function propertyNameText(
  name: ts.PropertyName | ts.BindingName,
  sourceFile: ts.SourceFile,
): string {
  if (
    ts.isIdentifier(name) ||
    ts.isPrivateIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name)
  ) {
    return name.text;
  }
  return name.getText(sourceFile);
}

function isPrivateName(
  name: ts.PropertyName | ts.BindingName | undefined,
  text: string,
): boolean {
  if (name && ts.isPrivateIdentifier(name)) {
    return true;
  }
  return text.startsWith("_") && !text.startsWith("__");
}

function hasPrivateModifier(node: ts.Node): boolean {
  if (!ts.canHaveModifiers(node)) {
    return false;
  }
  return (ts.getModifiers(node) ?? []).some(
    (modifier) => modifier.kind === ts.SyntaxKind.PrivateKeyword,
  );
}

/** Map each definition node to its definition, for ancestor lookups. */
export function indexDefinitions(
  definitions: readonly FunctionDefinition[],
): ReadonlyMap<ts.Node, FunctionDefinition> {
  const index = new Map<ts.Node, FunctionDefinition>();
  for (const definition of definitions) {
    index.set(definition.node, definition);
  }
  return index;
}

/**
 * Nearest function-like ancestor of `node`, together with the nearest
 * enclosing named definition (which may be further out for callbacks).
 */
export function enclosingFunction(
  node: ts.Node,
  index: ReadonlyMap<ts.Node, FunctionDefinition>,
): { readonly inFunction: boolean; readonly definition?: FunctionDefinition } {
  let inFunction = false;
  let current: ts.Node | undefined = node.parent;
  while (current && !ts.isSourceFile(current)) {
    if (ts.isFunctionLike(current)) {
      inFunction = true;
      const definition = index.get(current);
      if (definition) {
        return { inFunction, definition };
      }
    }
    current = current.parent;
  }
  return { inFunction };
}
