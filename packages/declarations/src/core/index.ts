export * from "./model.js";
export * from "./declarationNode.js";
export * from "./ports/index.js";
export { resolveModifier, MODIFIER_RULES } from "./extraction/modifiers.js";
export { isVisible, filterVisible } from "./extraction/visibility.js";
export {
  collectDeclarations,
  directMembers,
  ownParameters,
  type DeclarationsByKind,
  type MemberKind,
} from "./extraction/treeWalker.js";
export { buildSourceModel, type BuildOptions } from "./extraction/modelBuilder.js";
export {
  DeclarationService,
  type ExtractionResult,
  type ListDeclarationsParams,
} from "./services/DeclarationService.js";
