export { TreeSitterCSharpParser } from "./parsers/TreeSitterCSharpParser.js";
export { toDeclarationNode, extractErrors } from "./parsers/CSharpNodeMapper.js";
export { NodeFileSystem } from "./filesystem/NodeFileSystem.js";
export { InMemoryCache } from "./cache/InMemoryCache.js";
