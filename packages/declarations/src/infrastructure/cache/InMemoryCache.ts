import type { ModelCache } from "../../core/ports/ModelCache.js";
import type { ExtractionResult } from "../../core/services/DeclarationService.js";

interface CacheEntry {
  result: ExtractionResult;
  mtime: number;
}

/**
 * In-memory implementation of ModelCache.
 * Validates entries by file modification time.
 */
export class InMemoryCache implements ModelCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxSize: number;

  constructor(maxSize = 100) {
    this.maxSize = maxSize;
  }

  get(filePath: string, mtime: number): ExtractionResult | undefined {
    const entry = this.entries.get(filePath);
    if (!entry) return undefined;

    if (entry.mtime !== mtime) {
      this.entries.delete(filePath);
      return undefined;
    }

    return entry.result;
  }

  set(filePath: string, mtime: number, result: ExtractionResult): void {
    // Evict oldest entry at capacity
    if (this.entries.size >= this.maxSize && !this.entries.has(filePath)) {
      const firstKey = this.entries.keys().next().value;
      if (firstKey !== undefined) {
        this.entries.delete(firstKey);
      }
    }

    this.entries.set(filePath, { result, mtime });
  }

  invalidate(filePath: string): void {
    this.entries.delete(filePath);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
