import { docstringsRule } from "./docstrings.js";
import { errorHandlingRule } from "./error-handling.js";
import { functionLengthRule } from "./function-length.js";
import { globalStateRule } from "./global-state.js";
import { moduleStructureRule } from "./module-structure.js";
import { typeHintsRule } from "./type-hints.js";
import type { AuditRule } from "./types.js";

/** Built-in rules in the order they run against each file. */
export const BUILTIN_RULES: readonly AuditRule[] = [
  typeHintsRule,
  docstringsRule,
  functionLengthRule,
  globalStateRule,
  moduleStructureRule,
  errorHandlingRule,
];

export function selectRules(
  disabled: readonly string[],
  rules: readonly AuditRule[] = BUILTIN_RULES,
): AuditRule[] {
  const skip = new Set(disabled);
  return rules.filter((rule) => !skip.has(rule.id));
}

export { collectFunctionDefinitions } from "./function-definitions.js";
export type { FunctionDefinition } from "./function-definitions.js";
export type { AuditRule, RuleContext } from "./types.js";
export { TYPE_HINTS } from "./type-hints.js";
export { DOCSTRINGS } from "./docstrings.js";
export { FUNCTION_LENGTH } from "./function-length.js";
export { GLOBAL_STATE } from "./global-state.js";
export { MODULE_STRUCTURE } from "./module-structure.js";
export { ERROR_HANDLING } from "./error-handling.js";
