import type {
  ClassModel,
  EnumModel,
  InterfaceModel,
  MethodModel,
  ParameterModel,
  SourceModel,
} from "../core/model.js";

/**
 * Render a SourceModel as a readable outline, one declaration per line.
 */
export function formatOutline(model: SourceModel): string {
  const lines: string[] = [`# ${model.path}`];

  for (const cls of model.classes) {
    lines.push(...formatType("class", cls));
    for (const ctor of cls.constructors) {
      lines.push(`  ${ctor.modifier} ${ctor.name}(${formatParameters(ctor.parameters)})`);
    }
  }
  for (const iface of model.interfaces) {
    lines.push(...formatType("interface", iface));
  }
  for (const en of model.enums) {
    lines.push(...formatEnum(en));
  }

  if (lines.length === 1) {
    lines.push("(no declarations)");
  }
  return lines.join("\n");
}

function formatType(keyword: string, model: ClassModel | InterfaceModel): string[] {
  return [
    `${model.modifier} ${keyword} ${model.name}`,
    ...model.properties.map((p) => `  ${p.modifier} ${p.type} ${p.name}`),
    ...model.methods.map(formatMethod),
  ];
}

function formatMethod(method: MethodModel): string {
  return `  ${method.modifier} ${method.returnType} ${method.name}(${formatParameters(method.parameters)})`;
}

function formatParameters(parameters: readonly ParameterModel[]): string {
  return parameters.map((p) => `${p.type} ${p.name}`).join(", ");
}

function formatEnum(model: EnumModel): string[] {
  return [
    `${model.modifier} enum ${model.name}`,
    ...model.values.map((v) => `  ${v.name} = ${v.value}`),
  ];
}
