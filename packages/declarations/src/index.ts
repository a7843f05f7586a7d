// Core types and extraction
export * from "./core/index.js";

// Infrastructure implementations
export * from "./infrastructure/index.js";

// Tool exports
export { registerAllTools, formatOutline, type Services } from "./tools/index.js";
