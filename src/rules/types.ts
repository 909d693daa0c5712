import type ts from "typescript";
import type { AuditConfig } from "../config/types.js";
import type { Issue } from "../auditor/types.js";
import type { FunctionDefinition } from "./function-definitions.js";

export interface RuleContext {
  /** Path the issues are reported against. */
  readonly file: string;
  readonly sourceFile: ts.SourceFile;
  readonly lines: readonly string[];
  readonly config: AuditConfig;
  /** Function definitions in source order, private ones included. */
  readonly functions: readonly FunctionDefinition[];
}

export interface AuditRule {
  readonly id: string;
  readonly description: string;
  check(context: RuleContext): Issue[];
}
