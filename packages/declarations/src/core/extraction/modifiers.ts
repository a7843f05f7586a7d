import type { ModifierKind } from "../model.js";

interface ModifierRule {
  matches: (tokens: readonly string[]) => boolean;
  result: ModifierKind;
}

const has =
  (keyword: string) =>
  (tokens: readonly string[]): boolean =>
    tokens.includes(keyword);

/**
 * Ranked rules, first match wins. A declaration such as `public static`
 * collapses to a single label; static outranks every accessibility keyword.
 */
export const MODIFIER_RULES: readonly ModifierRule[] = [
  { matches: has("static"), result: "static" },
  { matches: has("public"), result: "public" },
  { matches: has("internal"), result: "internal" },
  { matches: has("protected"), result: "protected" },
];

const FALLBACK: ModifierKind = "private";

/**
 * Resolve a declaration's modifier keywords to exactly one ModifierKind.
 */
export function resolveModifier(tokens: readonly string[]): ModifierKind {
  for (const rule of MODIFIER_RULES) {
    if (rule.matches(tokens)) {
      return rule.result;
    }
  }
  return FALLBACK;
}
