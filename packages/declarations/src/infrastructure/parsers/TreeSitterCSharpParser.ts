import { Err, Ok, type Result, toError } from "@skeleton-extract/core";
import Parser from "tree-sitter";

import { isCSharpFile } from "../../core/model.js";
import type { ParsedTree, SyntaxTreeParser } from "../../core/ports/SyntaxTreeParser.js";
import { extractErrors, toDeclarationNode } from "./CSharpNodeMapper.js";

// Tree-sitter language type (uses any in the typings)
type TreeSitterLanguage = unknown;

const loadCSharpGrammar = async (): Promise<TreeSitterLanguage> => {
  const mod = await import("tree-sitter-c-sharp");
  return mod.default;
};

/**
 * Tree-sitter based parser for C# sources.
 */
export class TreeSitterCSharpParser implements SyntaxTreeParser {
  private readonly parser: Parser;
  private grammar: TreeSitterLanguage | undefined;

  constructor() {
    this.parser = new Parser();
  }

  async parse(source: string, filePath: string): Promise<Result<ParsedTree, Error>> {
    if (!this.supportsFile(filePath)) {
      return Err(new Error(`Unsupported file type: ${filePath}`));
    }

    try {
      this.parser.setLanguage(await this.getGrammar());
      const tree = this.parser.parse(source);

      return Ok({
        root: toDeclarationNode(tree.rootNode),
        errors: extractErrors(tree.rootNode),
      });
    } catch (error) {
      return Err(toError(error));
    }
  }

  supportsFile(filePath: string): boolean {
    return isCSharpFile(filePath);
  }

  private async getGrammar(): Promise<TreeSitterLanguage> {
    if (this.grammar === undefined) {
      this.grammar = await loadCSharpGrammar();
    }
    return this.grammar;
  }
}
