import { describe, it, expect } from "vitest";
import { resolveModifier, MODIFIER_RULES } from "../src/core/extraction/modifiers.js";

describe("resolveModifier", () => {
  it("resolves a single accessibility keyword", () => {
    expect(resolveModifier(["public"])).toBe("public");
    expect(resolveModifier(["internal"])).toBe("internal");
    expect(resolveModifier(["protected"])).toBe("protected");
    expect(resolveModifier(["private"])).toBe("private");
  });

  it("ranks static above every accessibility keyword", () => {
    const combinations = [
      ["public", "static"],
      ["static", "public"],
      ["internal", "static"],
      ["protected", "static", "readonly"],
      ["private", "static"],
      ["static"],
    ];
    for (const tokens of combinations) {
      expect(resolveModifier(tokens)).toBe("static");
    }
  });

  it("ranks public above internal and internal above protected", () => {
    expect(resolveModifier(["protected", "internal"])).toBe("internal");
    expect(resolveModifier(["protected", "public"])).toBe("public");
  });

  it("defaults to private without accessibility keywords", () => {
    expect(resolveModifier([])).toBe("private");
    expect(resolveModifier(["abstract", "sealed"])).toBe("private");
  });

  it("matches keywords exactly", () => {
    expect(resolveModifier(["Public", "STATIC"])).toBe("private");
  });

  it("evaluates rules in a fixed order", () => {
    expect(MODIFIER_RULES.map((rule) => rule.result)).toEqual(["static", "public", "internal", "protected"]);
  });
});
