/**
 * Assembles a SourceModel from a declaration tree.
 *
 * Walks the tree once per type kind, filters members by visibility and
 * resolves one modifier per declaration. Synchronous and stateless: the
 * same tree always yields an equal model.
 */
import type { DeclarationNode } from "../declarationNode.js";
import {
  NO_VALUE,
  UNTYPED_PARAMETER,
  type ClassModel,
  type ConstructorModel,
  type EnumModel,
  type EnumValueModel,
  type InterfaceModel,
  type MethodModel,
  type ParameterModel,
  type PropertyModel,
  type SourceLanguage,
  type SourceModel,
} from "../model.js";
import { resolveModifier } from "./modifiers.js";
import { collectDeclarations, directMembers, ownParameters } from "./treeWalker.js";
import { filterVisible } from "./visibility.js";

export interface BuildOptions {
  language?: SourceLanguage;
}

export function buildSourceModel(
  root: DeclarationNode,
  path: string,
  options: BuildOptions = {}
): SourceModel {
  const language = options.language ?? "csharp";
  const declarations = collectDeclarations(root);

  return {
    path,
    classes: declarations.class.map((node) => buildClass(node, language)),
    interfaces: declarations.interface.map((node) => buildInterface(node, language)),
    enums: declarations.enum.map((node) => buildEnum(node, language)),
  };
}

function buildClass(node: DeclarationNode, language: SourceLanguage): ClassModel {
  return {
    ...buildInterface(node, language),
    constructors: buildConstructors(node),
  };
}

function buildInterface(node: DeclarationNode, language: SourceLanguage): InterfaceModel {
  return {
    name: node.name,
    modifier: resolveModifier(node.modifiers),
    language,
    properties: buildProperties(node),
    methods: buildMethods(node),
  };
}

function buildEnum(node: DeclarationNode, language: SourceLanguage): EnumModel {
  return {
    name: node.name,
    modifier: resolveModifier(node.modifiers),
    language,
    values: directMembers(node, "enum_member").map(buildEnumValue),
  };
}

function buildProperties(container: DeclarationNode): PropertyModel[] {
  return filterVisible(directMembers(container, "property")).map((property) => ({
    name: property.name,
    type: property.typeText ?? "",
    modifier: resolveModifier(property.modifiers),
  }));
}

// Parameters are taken from each method's own list, not pooled per container.
function buildMethods(container: DeclarationNode): MethodModel[] {
  return filterVisible(directMembers(container, "method")).map((method) => ({
    name: method.name,
    returnType: method.typeText ?? "",
    modifier: resolveModifier(method.modifiers),
    parameters: buildParameters(method),
  }));
}

function buildConstructors(container: DeclarationNode): ConstructorModel[] {
  return filterVisible(directMembers(container, "constructor")).map((ctor) => ({
    name: ctor.name,
    modifier: resolveModifier(ctor.modifiers),
    parameters: buildParameters(ctor),
  }));
}

function buildParameters(member: DeclarationNode): ParameterModel[] {
  return ownParameters(member).map((parameter) => ({
    name: parameter.name,
    type: parameter.typeText ?? UNTYPED_PARAMETER,
  }));
}

function buildEnumValue(member: DeclarationNode): EnumValueModel {
  const initializer = member.initializer;
  return {
    name: member.name,
    value: initializer?.literal ? initializer.text : NO_VALUE,
  };
}
