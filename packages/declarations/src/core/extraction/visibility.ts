import type { DeclarationNode, NodeKind } from "../declarationNode.js";

const PROPERTY_ACCESS = ["public", "internal", "protected"];
const PUBLIC_ONLY = ["public"];

/**
 * Accessibility keywords that admit a member of each kind.
 * Kinds without an entry are always included.
 */
const REQUIRED_ACCESS: Partial<Record<NodeKind, readonly string[]>> = {
  property: PROPERTY_ACCESS,
  method: PUBLIC_ONLY,
  constructor: PUBLIC_ONLY,
};

/**
 * Decide whether a declaration of the given kind is visible.
 * Implicit (unmarked) accessibility is never promoted.
 */
export function isVisible(kind: NodeKind, modifiers: readonly string[]): boolean {
  const required = REQUIRED_ACCESS[kind];
  if (!required) return true;
  return modifiers.some((m) => required.includes(m));
}

export function filterVisible(nodes: readonly DeclarationNode[]): DeclarationNode[] {
  return nodes.filter((node) => isVisible(node.kind, node.modifiers));
}
