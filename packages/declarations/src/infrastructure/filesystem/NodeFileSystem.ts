import fs from "node:fs";
import path from "node:path";
import { type Result, tryCatch } from "@skeleton-extract/core";

import type { FileStats, FileSystem } from "../../core/ports/FileSystem.js";

/**
 * Node.js implementation of the FileSystem port.
 * Relative paths resolve against the base path (cwd by default).
 */
export class NodeFileSystem implements FileSystem {
  private readonly basePath: string;

  constructor(basePath?: string) {
    this.basePath = basePath ?? process.cwd();
  }

  private resolvePath(filePath: string): string {
    if (path.isAbsolute(filePath)) {
      return filePath;
    }
    return path.resolve(this.basePath, filePath);
  }

  read(filePath: string): Result<string, Error> {
    return tryCatch(() => fs.readFileSync(this.resolvePath(filePath), "utf-8"));
  }

  exists(filePath: string): boolean {
    return fs.existsSync(this.resolvePath(filePath));
  }

  stats(filePath: string): Result<FileStats, Error> {
    return tryCatch(() => {
      const stat = fs.statSync(this.resolvePath(filePath));
      return { mtime: stat.mtimeMs, size: stat.size };
    });
  }
}
