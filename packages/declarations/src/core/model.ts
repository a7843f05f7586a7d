/**
 * Declaration model produced from one source file.
 *
 * Field names and shapes are read verbatim by skeleton generators.
 */

export type ModifierKind = "static" | "public" | "internal" | "protected" | "private";

export type SourceLanguage = "csharp";

export interface ParameterModel {
  readonly name: string;
  /** Declared type text, or "any" when the parameter has no annotation */
  readonly type: string;
}

export interface PropertyModel {
  readonly name: string;
  readonly type: string;
  readonly modifier: ModifierKind;
}

export interface MethodModel {
  readonly name: string;
  readonly returnType: string;
  readonly modifier: ModifierKind;
  readonly parameters: readonly ParameterModel[];
}

export interface ConstructorModel {
  readonly name: string;
  readonly modifier: ModifierKind;
  readonly parameters: readonly ParameterModel[];
}

export interface InterfaceModel {
  readonly name: string;
  readonly modifier: ModifierKind;
  readonly language: SourceLanguage;
  readonly properties: readonly PropertyModel[];
  readonly methods: readonly MethodModel[];
}

export interface ClassModel extends InterfaceModel {
  readonly constructors: readonly ConstructorModel[];
}

export interface EnumValueModel {
  readonly name: string;
  /** Literal initializer text, or NO_VALUE */
  readonly value: string;
}

export interface EnumModel {
  readonly name: string;
  readonly modifier: ModifierKind;
  readonly language: SourceLanguage;
  readonly values: readonly EnumValueModel[];
}

export interface SourceModel {
  readonly path: string;
  readonly classes: readonly ClassModel[];
  readonly interfaces: readonly InterfaceModel[];
  readonly enums: readonly EnumModel[];
}

export const NO_VALUE = "no-value";
export const UNTYPED_PARAMETER = "any";

/**
 * Type declaration kinds, in the order they appear in a SourceModel.
 */
export const TYPE_DECLARATION_KINDS = ["class", "interface", "enum"] as const;
export type TypeDeclarationKind = (typeof TYPE_DECLARATION_KINDS)[number];

/**
 * Flat summary of one type declaration (used for listings).
 */
export interface DeclarationSummary {
  name: string;
  kind: TypeDeclarationKind;
  modifier: ModifierKind;
  /** Properties + methods + constructors, or enum values */
  memberCount: number;
}

export function summarize(model: SourceModel): DeclarationSummary[] {
  return [
    ...model.classes.map((c) => ({
      name: c.name,
      kind: "class" as const,
      modifier: c.modifier,
      memberCount: c.properties.length + c.methods.length + c.constructors.length,
    })),
    ...model.interfaces.map((i) => ({
      name: i.name,
      kind: "interface" as const,
      modifier: i.modifier,
      memberCount: i.properties.length + i.methods.length,
    })),
    ...model.enums.map((e) => ({
      name: e.name,
      kind: "enum" as const,
      modifier: e.modifier,
      memberCount: e.values.length,
    })),
  ];
}

/**
 * Detect whether a path names a C# source file.
 */
export function isCSharpFile(filePath: string): boolean {
  return filePath.slice(filePath.lastIndexOf(".")).toLowerCase() === ".cs";
}
