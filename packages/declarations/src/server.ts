#!/usr/bin/env node
/**
 * MCP server for declaration extraction.
 */

import { runServer } from "@skeleton-extract/core";

import { DeclarationService } from "./core/services/DeclarationService.js";
import { InMemoryCache } from "./infrastructure/cache/InMemoryCache.js";
import { NodeFileSystem } from "./infrastructure/filesystem/NodeFileSystem.js";
import { TreeSitterCSharpParser } from "./infrastructure/parsers/TreeSitterCSharpParser.js";
import { type Services, registerAllTools } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "skeleton-extract:declarations",
    version: "0.1.0",
  },
  createServices: () => ({
    declarations: new DeclarationService(
      new TreeSitterCSharpParser(),
      new NodeFileSystem(),
      new InMemoryCache()
    ),
  }),
  registerTools: registerAllTools,
  onStartup: () => {
    console.error(`[declarations] Ready. Resolving paths against ${process.cwd()}`);
  },
});
