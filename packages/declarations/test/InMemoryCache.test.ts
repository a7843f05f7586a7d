import { describe, it, expect } from "vitest";
import { InMemoryCache } from "../src/infrastructure/cache/InMemoryCache.js";
import type { ExtractionResult } from "../src/core/services/DeclarationService.js";

const resultFor = (path: string): ExtractionResult => ({
  model: { path, classes: [], interfaces: [], enums: [] },
  errors: [],
});

describe("InMemoryCache", () => {
  it("returns entries stored for the same mtime", () => {
    const cache = new InMemoryCache();
    const result = resultFor("A.cs");
    cache.set("A.cs", 10, result);
    expect(cache.get("A.cs", 10)).toBe(result);
  });

  it("drops entries whose mtime no longer matches", () => {
    const cache = new InMemoryCache();
    cache.set("A.cs", 10, resultFor("A.cs"));
    expect(cache.get("A.cs", 11)).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("evicts the oldest entry at capacity", () => {
    const cache = new InMemoryCache(2);
    cache.set("A.cs", 1, resultFor("A.cs"));
    cache.set("B.cs", 1, resultFor("B.cs"));
    cache.set("C.cs", 1, resultFor("C.cs"));

    expect(cache.get("A.cs", 1)).toBeUndefined();
    expect(cache.get("B.cs", 1)?.model.path).toBe("B.cs");
    expect(cache.get("C.cs", 1)?.model.path).toBe("C.cs");
  });

  it("replaces an existing entry without evicting others", () => {
    const cache = new InMemoryCache(2);
    cache.set("A.cs", 1, resultFor("A.cs"));
    cache.set("B.cs", 1, resultFor("B.cs"));
    cache.set("A.cs", 2, resultFor("A.cs"));

    expect(cache.size).toBe(2);
    expect(cache.get("B.cs", 1)).toBeDefined();
  });

  it("invalidates and clears", () => {
    const cache = new InMemoryCache();
    cache.set("A.cs", 1, resultFor("A.cs"));
    cache.set("B.cs", 1, resultFor("B.cs"));

    cache.invalidate("A.cs");
    expect(cache.get("A.cs", 1)).toBeUndefined();

    cache.clear();
    expect(cache.size).toBe(0);
  });
});
