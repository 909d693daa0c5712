import path from "node:path";
import ts from "typescript";

export type ParseResult =
  | { readonly ok: true; readonly sourceFile: ts.SourceFile }
  | { readonly ok: false; readonly line: number; readonly message: string };

const PARSE_OPTIONS: ts.CompilerOptions = {
  noLib: true,
  noResolve: true,
  allowJs: true,
  types: [],
  target: ts.ScriptTarget.Latest,
};

export function getScriptKind(filePath: string): ts.ScriptKind {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".tsx") {
    return ts.ScriptKind.TSX;
  }
  if (ext === ".jsx") {
    return ts.ScriptKind.JSX;
  }
  if (ext === ".js" || ext === ".mjs" || ext === ".cjs") {
    return ts.ScriptKind.JS;
  }
  return ts.ScriptKind.TS;
}

/**
 * Parse source text into a syntax tree.
 *
 * The tree is only returned when the parser reported no syntactic
 * diagnostics; otherwise the first diagnostic becomes the failure.
 */
export function parseSource(fileName: string, text: string): ParseResult {
  const sourceFile = ts.createSourceFile(
    fileName,
    text,
    ts.ScriptTarget.Latest,
    true,
    getScriptKind(fileName),
  );

  const diagnostics = collectSyntacticDiagnostics(sourceFile);
  const first = diagnostics[0];
  if (!first) {
    return { ok: true, sourceFile };
  }

  return {
    ok: false,
    line:
      first.start === undefined
        ? 1
        : sourceFile.getLineAndCharacterOfPosition(first.start).line + 1,
    message: ts.flattenDiagnosticMessageText(first.messageText, " "),
  };
}

function collectSyntacticDiagnostics(
  sourceFile: ts.SourceFile,
): readonly ts.Diagnostic[] {
  const host = ts.createCompilerHost(PARSE_OPTIONS);
  host.getSourceFile = (requested) =>
    path.resolve(requested) === path.resolve(sourceFile.fileName)
      ? sourceFile
      : undefined;
  host.fileExists = (requested) =>
    path.resolve(requested) === path.resolve(sourceFile.fileName);

  const program = ts.createProgram({
    rootNames: [sourceFile.fileName],
    options: PARSE_OPTIONS,
    host,
  });
  return program.getSyntacticDiagnostics(sourceFile);
}

export function lineOf(sourceFile: ts.SourceFile, position: number): number {
  return sourceFile.getLineAndCharacterOfPosition(position).line + 1;
}
