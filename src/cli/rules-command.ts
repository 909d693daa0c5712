import { BUILTIN_RULES } from "../rules/index.js";

export function renderRuleList(): string {
  const width = Math.max(...BUILTIN_RULES.map((rule) => rule.id.length));
  return BUILTIN_RULES.map(
    (rule) => `${rule.id.padEnd(width)}  ${rule.description}`,
  ).join("\n");
}
