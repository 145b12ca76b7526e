import { describe, it, expect, vi } from "vitest";

import { CompilationService, InfrastructureErrorCode } from "../src/index.js";
import { createTestLogger, decodeImage, source, template, testEnvironment } from "./_helpers/environment.js";

const counterProject = [
  template("Index.view", "<counter></counter>"),
  template("Counter.view", '<button click.trigger="this.count++">${this.count}</button>\n@code {\n  count = 0;\n}\n'),
];

describe("CompilationService", () => {
  const environment = testEnvironment();

  it("compiles a project and reports progress", async () => {
    const service = new CompilationService({ environment });
    const onStatus = vi.fn();

    const result = await service.compileToAssembly(counterProject, onStatus);

    expect(result.diagnostics).toEqual([]);
    expect(decodeImage(result.binaryImage)).toContain("class Counter extends Component {");
    expect(decodeImage(result.binaryImage)).toContain("h(Counter, null)");
    expect(onStatus.mock.calls).toEqual([["Preparing Project"], ["Compiling Assembly"]]);
  });

  it("returns the cached result without reporting progress", async () => {
    const logger = createTestLogger();
    const service = new CompilationService({ environment, logger });
    const first = await service.compileToAssembly(counterProject);

    const onStatus = vi.fn();
    const second = await service.compileToAssembly([...counterProject], onStatus);

    expect(second).toBe(first);
    expect(onStatus).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledTimes(1);
  });

  it("treats a reordered file set as a new request", async () => {
    const service = new CompilationService({ environment });
    const first = await service.compileToAssembly(counterProject);
    const second = await service.compileToAssembly([...counterProject].reverse());

    expect(second).not.toBe(first);
    expect(second.diagnostics).toEqual([]);
  });

  it("recompiles after invalidate", async () => {
    const service = new CompilationService({ environment });
    const first = await service.compileToAssembly(counterProject);
    service.invalidate();
    const second = await service.compileToAssembly(counterProject);

    expect(second).not.toBe(first);
    expect(second).toEqual(first);
  });

  it("withholds the image when a template is broken", async () => {
    const service = new CompilationService({ environment });
    const onStatus = vi.fn();

    const result = await service.compileToAssembly([template("Broken.view", "<p></p>\n@code {\n")], onStatus);

    expect(result.binaryImage).toBeUndefined();
    expect(result.diagnostics.map((d) => d.code)).toEqual(["TPL0001"]);
    expect(onStatus.mock.calls).toEqual([["Compiling Assembly"]]);
  });

  it("withholds the image when two paths name the same file", async () => {
    const service = new CompilationService({ environment });
    const result = await service.compileToAssembly([source("/a", "const a: number = 'x';"), source("a", "const b = 1;")]);

    expect(result.binaryImage).toBeUndefined();
    expect(result.diagnostics.map((d) => d.code)).toEqual(["PB0001"]);
  });

  it("compiles paths with a leading dot segment", async () => {
    const service = new CompilationService({ environment });
    const result = await service.compileToAssembly([source("./util.ts", "const u = 1;")]);

    expect(result.diagnostics).toEqual([]);
    expect(decodeImage(result.binaryImage)).toBe('/*! Playbench.UserComponents */\n"use strict";\nconst u = 1;\n');
  });

  it("hands out a frozen result", async () => {
    const service = new CompilationService({ environment });
    const result = await service.compileToAssembly([template("Page.view", "<fancy-box></fancy-box>")]);

    expect(result.diagnostics.map((d) => d.code)).toEqual(["TPL1001"]);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.diagnostics)).toBe(true);
    expect(Object.isFrozen(result.diagnostics[0])).toBe(true);
  });

  it("logs and ignores a throwing status callback", async () => {
    const logger = createTestLogger();
    const service = new CompilationService({ environment, logger });

    const result = await service.compileToAssembly(counterProject, () => {
      throw new Error("boom");
    });

    expect(result.diagnostics).toEqual([]);
    expect(logger.warn.mock.calls).toEqual([
      ["[compile] status callback failed for 'Preparing Project': boom"],
      ["[compile] status callback failed for 'Compiling Assembly': boom"],
    ]);
  });

  it("logs a rejecting status callback", async () => {
    const logger = createTestLogger();
    const service = new CompilationService({ environment, logger });

    const result = await service.compileToAssembly(counterProject, async () => {
      throw new Error("late");
    });

    expect(result.binaryImage).toBeDefined();
    await vi.waitFor(() => expect(logger.warn).toHaveBeenCalledTimes(2));
  });

  it("requires the process-wide environment when none is given", async () => {
    const service = new CompilationService();
    await expect(service.compileToAssembly(counterProject)).rejects.toMatchObject({
      code: InfrastructureErrorCode.ENV_NOT_INITIALIZED,
    });
  });
});
