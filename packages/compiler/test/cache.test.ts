import { describe, it, expect } from "vitest";
import type { CompilationDiagnostic } from "@playbench/shared";

import { CompilationCache, computeFingerprint } from "../src/index.js";
import { source, template } from "./_helpers/environment.js";

describe("computeFingerprint", () => {
  const a = source("a.ts", "const a = 1;");
  const b = template("B.view", "<p></p>");

  it("is stable for equal inputs", () => {
    expect(computeFingerprint([a, b])).toBe(computeFingerprint([{ ...a }, { ...b }]));
    expect(computeFingerprint([a, b])).toMatch(/^[0-9a-f]{64}$/);
  });

  it("depends on order, paths and contents", () => {
    const base = computeFingerprint([a, b]);
    expect(computeFingerprint([b, a])).not.toBe(base);
    expect(computeFingerprint([{ ...a, path: "c.ts" }, b])).not.toBe(base);
    expect(computeFingerprint([{ ...a, content: "const a = 2;" }, b])).not.toBe(base);
  });

  it("ignores the file type", () => {
    expect(computeFingerprint([{ ...a, type: "template" }])).toBe(computeFingerprint([a]));
  });

  it("keeps path and content apart", () => {
    expect(computeFingerprint([source("ab", "c")])).not.toBe(computeFingerprint([source("a", "bc")]));
  });
});

describe("CompilationCache", () => {
  const result = { diagnostics: [] };

  it("hits only on the stored fingerprint", () => {
    const cache = new CompilationCache();
    expect(cache.lookup("one")).toBeUndefined();

    cache.store("one", result);
    expect(cache.fingerprint).toBe("one");
    expect(cache.lookup("one")).toBe(result);
    expect(cache.lookup("two")).toBeUndefined();
  });

  it("keeps a single slot", () => {
    const cache = new CompilationCache();
    const next = { diagnostics: [] };
    cache.store("one", result);
    cache.store("two", next);

    expect(cache.lookup("one")).toBeUndefined();
    expect(cache.lookup("two")).toBe(next);
  });

  it("freezes the stored result and its diagnostics", () => {
    const cache = new CompilationCache();
    const diagnostics: CompilationDiagnostic[] = [
      { code: "TPL1001", message: "unknown element", severity: "warning", stage: "translate", location: { file: "Page.view", line: 1, column: 1 } },
    ];
    const stored = { diagnostics };
    cache.store("one", stored);

    const hit = cache.lookup("one");
    expect(hit).toBe(stored);
    expect(Object.isFrozen(hit)).toBe(true);
    expect(Object.isFrozen(hit?.diagnostics)).toBe(true);
    expect(Object.isFrozen(hit?.diagnostics[0])).toBe(true);
    expect(Object.isFrozen(hit?.diagnostics[0]?.location)).toBe(true);
    expect(() =>
      diagnostics.push({ code: "X", message: "late", severity: "warning", stage: "link", location: { file: "x", line: 1, column: 1 } }),
    ).toThrow(TypeError);
  });

  it("forgets on clear", () => {
    const cache = new CompilationCache();
    cache.store("one", result);
    cache.clear();
    expect(cache.lookup("one")).toBeUndefined();
    expect(cache.fingerprint).toBeUndefined();
  });
});
