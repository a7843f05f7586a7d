import * as z from "zod/v4";

import { TYPE_DECLARATION_KINDS } from "../core/model.js";

export const ModifierKindSchema = z.enum(["static", "public", "internal", "protected", "private"]);

export const TypeDeclarationKindSchema = z.enum(TYPE_DECLARATION_KINDS);

export const ParameterModelSchema = z.object({
  name: z.string(),
  type: z.string(),
});

export const PropertyModelSchema = z.object({
  name: z.string(),
  type: z.string(),
  modifier: ModifierKindSchema,
});

export const MethodModelSchema = z.object({
  name: z.string(),
  returnType: z.string(),
  modifier: ModifierKindSchema,
  parameters: z.array(ParameterModelSchema),
});

export const ConstructorModelSchema = z.object({
  name: z.string(),
  modifier: ModifierKindSchema,
  parameters: z.array(ParameterModelSchema),
});

export const InterfaceModelSchema = z.object({
  name: z.string(),
  modifier: ModifierKindSchema,
  language: z.literal("csharp"),
  properties: z.array(PropertyModelSchema),
  methods: z.array(MethodModelSchema),
});

export const ClassModelSchema = InterfaceModelSchema.extend({
  constructors: z.array(ConstructorModelSchema),
});

export const EnumModelSchema = z.object({
  name: z.string(),
  modifier: ModifierKindSchema,
  language: z.literal("csharp"),
  values: z.array(z.object({ name: z.string(), value: z.string() })),
});

export const SourceModelSchema = z.object({
  path: z.string(),
  classes: z.array(ClassModelSchema),
  interfaces: z.array(InterfaceModelSchema),
  enums: z.array(EnumModelSchema),
});

export const ParseErrorSchema = z.object({
  message: z.string(),
  line: z.number(),
  column: z.number(),
});

export const DeclarationSummarySchema = z.object({
  name: z.string(),
  kind: TypeDeclarationKindSchema,
  modifier: ModifierKindSchema,
  memberCount: z.number(),
});
