export * from "./auditor/index.js";
export * from "./config/index.js";
export * from "./ingest/index.js";
export * from "./report/index.js";
export {
  BUILTIN_RULES,
  selectRules,
  collectFunctionDefinitions,
} from "./rules/index.js";
export type {
  AuditRule,
  FunctionDefinition,
  RuleContext,
} from "./rules/index.js";
export { parseSource } from "./parser/source-parser.js";
export type { ParseResult } from "./parser/source-parser.js";
