import type { ExtractionResult } from "../services/DeclarationService.js";

/**
 * Port for caching extraction results per file.
 */
export interface ModelCache {
  /**
   * Get cached result if still valid.
   *
   * @param filePath - Path to the file
   * @param mtime - Current modification time (for validation)
   * @returns Cached result if valid, undefined otherwise
   */
  get(filePath: string, mtime: number): ExtractionResult | undefined;

  /**
   * Store a result for the file as of the given modification time.
   */
  set(filePath: string, mtime: number, result: ExtractionResult): void;

  invalidate(filePath: string): void;

  clear(): void;
}
