import type { Result } from "@skeleton-extract/core";

import type { DeclarationNode } from "../declarationNode.js";

export interface ParseError {
  message: string;
  /** 1-indexed */
  line: number;
  /** 1-indexed */
  column: number;
}

export interface ParsedTree {
  root: DeclarationNode;
  /** Syntax errors found in the tree; the tree is still usable */
  errors: ParseError[];
}

/**
 * Port for turning source text into a declaration tree.
 */
export interface SyntaxTreeParser {
  /**
   * Parse source code into a declaration tree.
   *
   * @param source - The source code to parse
   * @param filePath - Path to the file (used for language detection)
   */
  parse(source: string, filePath: string): Promise<Result<ParsedTree, Error>>;

  /**
   * Whether this parser handles the given file.
   */
  supportsFile(filePath: string): boolean;
}
