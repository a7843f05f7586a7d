import type { Result } from "@skeleton-extract/core";

export interface FileStats {
  mtime: number;
  size: number;
}

/**
 * Port for reading source files.
 */
export interface FileSystem {
  /**
   * Read file contents as string.
   */
  read(filePath: string): Result<string, Error>;

  /**
   * Check if file exists.
   */
  exists(filePath: string): boolean;

  /**
   * Get file stats (for cache invalidation).
   */
  stats(filePath: string): Result<FileStats, Error>;
}
