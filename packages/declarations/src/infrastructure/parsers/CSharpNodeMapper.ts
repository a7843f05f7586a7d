/**
 * Maps tree-sitter-c-sharp syntax nodes onto DeclarationNode.
 */
import type Parser from "tree-sitter";

import type { DeclarationNode, Initializer, NodeKind } from "../../core/declarationNode.js";
import type { ParseError } from "../../core/ports/SyntaxTreeParser.js";

const KIND_BY_NODE_TYPE: Record<string, NodeKind> = {
  class_declaration: "class",
  interface_declaration: "interface",
  enum_declaration: "enum",
  property_declaration: "property",
  method_declaration: "method",
  constructor_declaration: "constructor",
  parameter: "parameter",
  enum_member_declaration: "enum_member",
  struct_declaration: "other_type",
  record_declaration: "other_type",
  record_struct_declaration: "other_type",
};

// integer_literal, string_literal, boolean_literal, null_literal, ...
const LITERAL_NODE_TYPE = /^[a-z_]+_literal$/;

export function kindOf(nodeType: string): NodeKind {
  return KIND_BY_NODE_TYPE[nodeType] ?? "other";
}

/**
 * Convert a syntax node and its subtree.
 */
export function toDeclarationNode(node: Parser.SyntaxNode): DeclarationNode {
  const kind = kindOf(node.type);

  switch (kind) {
    case "method":
    case "constructor":
      return {
        kind,
        name: fieldText(node, "name"),
        modifiers: modifiersOf(node),
        typeText: kind === "method" ? returnTypeOf(node) : undefined,
        children: parametersOf(node),
      };

    case "property":
      return {
        kind,
        name: fieldText(node, "name"),
        modifiers: modifiersOf(node),
        typeText: node.childForFieldName("type")?.text,
        children: [],
      };

    case "parameter":
      return {
        kind,
        name: fieldText(node, "name"),
        modifiers: [],
        typeText: node.childForFieldName("type")?.text,
        children: [],
      };

    case "enum_member":
      return {
        kind,
        name: fieldText(node, "name"),
        modifiers: modifiersOf(node),
        initializer: initializerOf(node),
        children: [],
      };

    default:
      return {
        kind,
        name: fieldText(node, "name"),
        modifiers: modifiersOf(node),
        children: node.namedChildren.map(toDeclarationNode),
      };
  }
}

function fieldText(node: Parser.SyntaxNode, field: string): string {
  return node.childForFieldName(field)?.text ?? "";
}

function modifiersOf(node: Parser.SyntaxNode): string[] {
  return node.namedChildren.filter((child) => child.type === "modifier").map((child) => child.text);
}

// Grammar releases name the return type field either "returns" or "type".
function returnTypeOf(node: Parser.SyntaxNode): string | undefined {
  return (node.childForFieldName("returns") ?? node.childForFieldName("type"))?.text;
}

/**
 * Parameters in declared order. A `params` array is not wrapped in a
 * `parameter` node: its keyword, type and name sit directly in the list.
 */
function parametersOf(node: Parser.SyntaxNode): DeclarationNode[] {
  const list = node.childForFieldName("parameters");
  if (!list) return [];

  const parameters: DeclarationNode[] = [];
  const children = list.children;
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    if (child.type === "parameter") {
      parameters.push(toDeclarationNode(child));
    } else if (child.type === "params") {
      const [type, name] = children.slice(i + 1).filter((next) => next.isNamed);
      parameters.push({
        kind: "parameter",
        name: name?.text ?? "",
        modifiers: [],
        typeText: type?.text,
        children: [],
      });
      i += 2;
    }
  }
  return parameters;
}

function initializerOf(node: Parser.SyntaxNode): Initializer | undefined {
  const value = node.childForFieldName("value") ?? equalsValueOf(node);
  if (!value) return undefined;
  const literal = LITERAL_NODE_TYPE.test(value.type);
  return {
    literal,
    text: literal ? literalValue(value) : value.text,
  };
}

const CHAR_ESCAPES: Record<string, string> = {
  "\\'": "'",
  '\\"': '"',
  "\\\\": "\\",
  "\\0": "\0",
  "\\n": "\n",
  "\\r": "\r",
  "\\t": "\t",
};

/**
 * The value a literal denotes: integers in decimal without separators or
 * suffixes, characters unquoted. Other literals keep their source text.
 */
function literalValue(node: Parser.SyntaxNode): string {
  switch (node.type) {
    case "integer_literal":
      return integerValue(node.text);
    case "character_literal": {
      const body = node.text.slice(1, -1);
      return CHAR_ESCAPES[body] ?? body;
    }
    default:
      return node.text;
  }
}

const INTEGER_DIGITS = /^(0[xX][0-9a-fA-F]+|0[bB][01]+|[0-9]+)$/;

function integerValue(text: string): string {
  const digits = text.replace(/_/g, "").replace(/[uUlL]+$/, "");
  return INTEGER_DIGITS.test(digits) ? BigInt(digits).toString() : text;
}

function equalsValueOf(node: Parser.SyntaxNode): Parser.SyntaxNode | undefined {
  const clause = node.namedChildren.find((child) => child.type === "equals_value_clause");
  return clause?.namedChildren[0];
}

/**
 * Collect ERROR and missing nodes.
 */
export function extractErrors(node: Parser.SyntaxNode): ParseError[] {
  const errors: ParseError[] = [];

  function traverse(n: Parser.SyntaxNode): void {
    if (n.type === "ERROR" || n.isMissing) {
      errors.push({
        message: n.isMissing ? `Missing: ${n.type}` : "Syntax error",
        line: n.startPosition.row + 1,
        column: n.startPosition.column + 1,
      });
    }

    for (const child of n.children) {
      traverse(child);
    }
  }

  traverse(node);
  return errors;
}
