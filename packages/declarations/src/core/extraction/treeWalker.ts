/**
 * Traversal passes over a DeclarationNode tree.
 */
import { type DeclarationNode, type NodeKind, isTypeDeclaration } from "../declarationNode.js";
import type { TypeDeclarationKind } from "../model.js";

export type DeclarationsByKind = Record<TypeDeclarationKind, DeclarationNode[]>;

export type MemberKind = Extract<NodeKind, "property" | "method" | "constructor" | "enum_member">;

const MEMBER_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>([
  "property",
  "method",
  "constructor",
  "enum_member",
]);

/**
 * Collect every class, interface and enum below the root, at any depth,
 * in depth-first pre-order. Nested types are returned flat.
 */
export function collectDeclarations(root: DeclarationNode): DeclarationsByKind {
  const found: DeclarationsByKind = { class: [], interface: [], enum: [] };
  visit(root, found);
  return found;
}

function visit(node: DeclarationNode, found: DeclarationsByKind): void {
  for (const child of node.children) {
    if (child.kind === "class" || child.kind === "interface" || child.kind === "enum") {
      found[child.kind].push(child);
    }
    visit(child, found);
  }
}

/**
 * Members of one kind declared directly in a container.
 *
 * Does not cross into nested type declarations or into other members.
 */
export function directMembers(container: DeclarationNode, kind: MemberKind): DeclarationNode[] {
  const members: DeclarationNode[] = [];
  collectMembers(container, kind, members);
  return members;
}

function collectMembers(node: DeclarationNode, kind: MemberKind, members: DeclarationNode[]): void {
  for (const child of node.children) {
    if (child.kind === kind) {
      members.push(child);
      continue;
    }
    if (isTypeDeclaration(child) || MEMBER_KINDS.has(child.kind)) {
      continue;
    }
    collectMembers(child, kind, members);
  }
}

/**
 * Parameters from a method's or constructor's own parameter list.
 */
export function ownParameters(member: DeclarationNode): DeclarationNode[] {
  return member.children.filter((child) => child.kind === "parameter");
}
