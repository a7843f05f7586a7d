/**
 * Builders for DeclarationNode trees used by the extraction tests.
 */
import type { DeclarationNode, Initializer } from "../../src/core/declarationNode.js";

type Children = DeclarationNode[];

export const root = (...children: Children): DeclarationNode => ({
  kind: "other",
  name: "",
  modifiers: [],
  children,
});

export const block = (...children: Children): DeclarationNode => root(...children);

export const cls = (name: string, modifiers: string[], ...children: Children): DeclarationNode => ({
  kind: "class",
  name,
  modifiers,
  children: [block(...children)],
});

export const iface = (name: string, modifiers: string[], ...children: Children): DeclarationNode => ({
  kind: "interface",
  name,
  modifiers,
  children: [block(...children)],
});

export const struct = (name: string, modifiers: string[], ...children: Children): DeclarationNode => ({
  kind: "other_type",
  name,
  modifiers,
  children: [block(...children)],
});

export const enm = (name: string, modifiers: string[], ...members: Children): DeclarationNode => ({
  kind: "enum",
  name,
  modifiers,
  children: members,
});

export const member = (name: string, initializer?: Initializer): DeclarationNode => ({
  kind: "enum_member",
  name,
  modifiers: [],
  initializer,
  children: [],
});

export const prop = (name: string, type: string, modifiers: string[]): DeclarationNode => ({
  kind: "property",
  name,
  modifiers,
  typeText: type,
  children: [],
});

export const method = (
  name: string,
  returnType: string,
  modifiers: string[],
  ...parameters: Children
): DeclarationNode => ({
  kind: "method",
  name,
  modifiers,
  typeText: returnType,
  children: parameters,
});

export const ctor = (name: string, modifiers: string[], ...parameters: Children): DeclarationNode => ({
  kind: "constructor",
  name,
  modifiers,
  children: parameters,
});

export const param = (name: string, type?: string): DeclarationNode => ({
  kind: "parameter",
  name,
  modifiers: [],
  typeText: type,
  children: [],
});
