import { Err, Ok, type Result, map } from "@skeleton-extract/core";

import { buildSourceModel } from "../extraction/modelBuilder.js";
import { type DeclarationSummary, type SourceModel, type TypeDeclarationKind, summarize } from "../model.js";
import type { FileSystem } from "../ports/FileSystem.js";
import type { ModelCache } from "../ports/ModelCache.js";
import type { ParseError, SyntaxTreeParser } from "../ports/SyntaxTreeParser.js";

export interface ExtractionResult {
  model: SourceModel;
  /** Syntax errors reported by the parser; extraction still ran */
  errors: ParseError[];
}

export interface ListDeclarationsParams {
  filePath: string;
  kinds?: TypeDeclarationKind[];
}

/**
 * Reads, parses and extracts declaration models from source files.
 */
export class DeclarationService {
  constructor(
    private readonly parser: SyntaxTreeParser,
    private readonly fs: FileSystem,
    private readonly cache: ModelCache
  ) {}

  /**
   * Extract the declaration model of a file, served from cache while the
   * file's mtime is unchanged.
   */
  async extractFile(filePath: string): Promise<Result<ExtractionResult, string>> {
    if (!this.fs.exists(filePath)) {
      return Err(`File not found: ${filePath}`);
    }

    const statsResult = this.fs.stats(filePath);
    if (!statsResult.ok) {
      return Err(statsResult.error.message);
    }

    const { mtime } = statsResult.value;
    const cached = this.cache.get(filePath, mtime);
    if (cached) {
      return Ok(cached);
    }

    const sourceResult = this.fs.read(filePath);
    if (!sourceResult.ok) {
      return Err(sourceResult.error.message);
    }

    const result = await this.extractSource(sourceResult.value, filePath);
    if (result.ok) {
      this.cache.set(filePath, mtime, result.value);
    }
    return result;
  }

  /**
   * Extract from source text already in memory. Bypasses the cache.
   */
  async extractSource(source: string, filePath: string): Promise<Result<ExtractionResult, string>> {
    const parseResult = await this.parser.parse(source, filePath);
    if (!parseResult.ok) {
      return Err(parseResult.error.message);
    }

    const { root, errors } = parseResult.value;
    if (errors.length > 0) {
      console.error(`[declarations] ${filePath}: ${errors.length} syntax error(s), extracting from partial tree`);
    }

    return Ok({ model: buildSourceModel(root, filePath), errors });
  }

  /**
   * List the type declarations of a file, optionally restricted to some kinds.
   */
  async listDeclarations(params: ListDeclarationsParams): Promise<Result<DeclarationSummary[], string>> {
    const kinds = params.kinds ?? [];
    const result = await this.extractFile(params.filePath);

    return map(result, ({ model }) => {
      const summaries = summarize(model);
      return kinds.length > 0 ? summaries.filter((s) => kinds.includes(s.kind)) : summaries;
    });
  }

  invalidate(filePath: string): void {
    this.cache.invalidate(filePath);
  }
}
