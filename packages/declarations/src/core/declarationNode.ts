/**
 * Minimal node interface the extractor walks.
 *
 * Parser adapters map their concrete syntax nodes onto this shape, so the
 * extraction passes never see a parser's own node types.
 */

export type NodeKind =
  | "class"
  | "interface"
  | "enum"
  | "property"
  | "method"
  | "constructor"
  | "parameter"
  | "enum_member"
  /** A type declaration the model does not cover (struct, record) */
  | "other_type"
  | "other";

export interface Initializer {
  /** Whether the initializer is a single literal expression */
  literal: boolean;
  /** The literal's value when `literal`, otherwise the expression source */
  text: string;
}

export interface DeclarationNode {
  readonly kind: NodeKind;
  /** Identifier as written; empty for nodes without one */
  readonly name: string;
  /** Modifier keywords in source order, e.g. ["public", "static"] */
  readonly modifiers: readonly string[];
  /** Property type, method return type or parameter type */
  readonly typeText?: string;
  /** Enum member initializer */
  readonly initializer?: Initializer;
  readonly children: readonly DeclarationNode[];
}

/**
 * Whether a node opens a new member scope.
 */
export function isTypeDeclaration(node: DeclarationNode): boolean {
  return (
    node.kind === "class" ||
    node.kind === "interface" ||
    node.kind === "enum" ||
    node.kind === "other_type"
  );
}
