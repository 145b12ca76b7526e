import { describe, it, expect } from "vitest";

import {
  CompilationInfrastructureError,
  discoverLibraries,
  getBaseEnvironment,
  initBaseEnvironment,
  InfrastructureErrorCode,
} from "../src/index.js";
import { testEnvironment } from "./_helpers/environment.js";

describe("discoverLibraries", () => {
  const files: Record<string, string> = {
    "lib.a.d.ts": '/// <reference lib="b" />\n/// <reference lib="c" />\n',
    "lib.b.d.ts": '/// <reference lib="a" />\n',
    "lib.c.d.ts": "",
  };

  it("follows lib references once per library", () => {
    const libraries = discoverLibraries(["A"], (name) => files[name]);
    expect(libraries.map((lib) => lib.fileName)).toEqual(["lib.a.d.ts", "lib.b.d.ts", "lib.c.d.ts"]);
    expect(libraries.every((lib) => lib.kind === "lib")).toBe(true);
  });

  it("fails when a library is missing", () => {
    expect(() => discoverLibraries(["a", "nope"], (name) => files[name])).toThrow(CompilationInfrastructureError);
    expect(() => discoverLibraries(["nope"], (name) => files[name])).toThrow(
      "Standard library 'nope' was not found (lib.nope.d.ts).",
    );
  });
});

describe("base environment lifecycle", () => {
  it("refuses to hand out an environment before initialization", () => {
    let error: unknown;
    try {
      getBaseEnvironment();
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(CompilationInfrastructureError);
    expect(error).toMatchObject({ code: InfrastructureErrorCode.ENV_NOT_INITIALIZED });
  });

  it("shares one build between concurrent callers", async () => {
    const [first, second] = await Promise.all([initBaseEnvironment(), initBaseEnvironment()]);
    expect(first).toBe(second);
    expect(getBaseEnvironment()).toBe(first);
    expect(await initBaseEnvironment({ assemblyName: "Ignored" })).toBe(first);
  });
});

describe("createBaseEnvironment", () => {
  const env = testEnvironment();

  it("loads the standard library closure", () => {
    const names = env.libraries.map((file) => file.split(/[\\/]/).pop());
    expect(names).toContain("lib.es2022.d.ts");
    expect(names).toContain("lib.es5.d.ts");
    expect(names).not.toContain("lib.dom.d.ts");
  });

  it("links the base unit cleanly", () => {
    expect(env.baseUnit.units).toEqual([]);
    expect(env.baseUnit.diagnostics()).toEqual([]);
  });

  it("exposes the framework components", () => {
    expect(env.reference.components.map((c) => c.name)).toEqual([
      "DialogProvider",
      "SnackbarProvider",
      "ActionButton",
      "TextField",
      "Card",
    ]);
    expect(env.reference.components.every((c) => c.origin === "framework")).toBe(true);
  });

  it("reports settable properties without base members", () => {
    const dialog = env.reference.components.find((c) => c.name === "DialogProvider");
    expect(dialog?.tagName).toBe("dialog-provider");
    expect(dialog?.properties.map((p) => p.name)).toEqual(["fullWidth", "maxWidth"]);
    expect(dialog?.properties[0]).toEqual({ name: "fullWidth", type: "boolean" });

    const button = env.reference.components.find((c) => c.name === "ActionButton");
    expect(button?.properties.map((p) => p.name)).toEqual(["label", "variant", "disabled", "onClick"]);
  });

  it("uses the default configuration", () => {
    expect(env.config.assemblyName).toBe("Playbench.UserComponents");
    expect(env.config.workingDirectory).toBe("/playbench/");
    expect(env.baseUnit.name).toBe("Playbench.UserComponents");
  });
});
