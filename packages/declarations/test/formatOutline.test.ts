import { describe, it, expect } from "vitest";
import { formatOutline } from "../src/tools/formatOutline.js";
import { buildSourceModel } from "../src/core/extraction/modelBuilder.js";
import { cls, ctor, enm, iface, member, method, param, prop, root } from "./helpers/nodes.js";

describe("formatOutline", () => {
  it("renders one line per declaration", () => {
    const model = buildSourceModel(
      root(
        cls(
          "Person",
          ["public"],
          prop("Age", "int", ["protected"]),
          ctor("Person", ["public"], param("name", "string")),
          method("Greet", "string", ["public"], param("other", "Person"), param("loud"))
        ),
        iface("IGreeter", ["internal"], method("Greet", "void", ["public"])),
        enm("Color", ["public"], member("Red"), member("Green", { literal: true, text: "5" }))
      ),
      "Person.cs"
    );

    expect(formatOutline(model)).toBe(
      [
        "# Person.cs",
        "public class Person",
        "  protected int Age",
        "  public string Greet(Person other, any loud)",
        "  public Person(string name)",
        "internal interface IGreeter",
        "  public void Greet()",
        "public enum Color",
        "  Red = no-value",
        "  Green = 5",
      ].join("\n")
    );
  });

  it("notes an empty model", () => {
    const model = buildSourceModel(root(), "Empty.cs");
    expect(formatOutline(model)).toBe("# Empty.cs\n(no declarations)");
  });
});
