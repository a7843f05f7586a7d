export type { SyntaxTreeParser, ParsedTree, ParseError } from "./SyntaxTreeParser.js";
export type { FileSystem, FileStats } from "./FileSystem.js";
export type { ModelCache } from "./ModelCache.js";
