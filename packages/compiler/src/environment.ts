/**
 * Base Environment
 *
 * Process-wide state every compilation starts from: the standard library closure,
 * the framework surface, the base link unit over both, and its reference.
 *
 * Built once by `initBaseEnvironment`; compilations read it with `getBaseEnvironment`.
 */

import path from "node:path";
import ts from "typescript";
import { debug, type LinkReference } from "@playbench/shared";
import { createTemplateEngine, type TemplateEngine } from "@playbench/template";

import { createTypeScriptBackend } from "./backend/typescript.js";
import type { LanguageBackend, LibraryFile, LinkUnit } from "./backend/types.js";
import { resolveConfig, type PlaybenchConfig, type ResolvedConfig } from "./config.js";
import { CompilationInfrastructureError, InfrastructureErrorCode } from "./errors.js";
import { FRAMEWORK_DTS, FRAMEWORK_FILE_NAME } from "./framework.js";

export interface BaseEnvironment {
  readonly config: ResolvedConfig;
  readonly backend: LanguageBackend;
  readonly templateEngine: TemplateEngine;
  /** Libraries plus framework surface; never emitted */
  readonly baseUnit: LinkUnit;
  /** Components of the framework surface */
  readonly reference: LinkReference;
  /** File names of the standard libraries in the closure */
  readonly libraries: readonly string[];
}

export type LibraryReader = (fileName: string) => string | undefined;

/**
 * Resolve the transitive `/// <reference lib="..." />` closure of the given libs.
 * Names are the `--lib` spellings (`es2022`, `es2015.promise`).
 */
export function discoverLibraries(roots: readonly string[], read: LibraryReader): LibraryFile[] {
  const queue = roots.map((name) => name.toLowerCase());
  const seen = new Set<string>();
  const libraries: LibraryFile[] = [];

  for (let name = queue.shift(); name !== undefined; name = queue.shift()) {
    if (seen.has(name)) continue;
    seen.add(name);

    const fileName = `lib.${name}.d.ts`;
    const text = read(fileName);
    if (text === undefined) {
      throw new CompilationInfrastructureError(
        `Standard library '${name}' was not found (${fileName}).`,
        InfrastructureErrorCode.LIB_NOT_FOUND,
      );
    }
    libraries.push({ fileName, text, kind: "lib" });

    for (const reference of ts.preProcessFile(text, true, true).libReferenceDirectives) {
      queue.push(reference.fileName.toLowerCase());
    }
  }

  return libraries;
}

/** Directory holding the `lib.*.d.ts` files of the installed compiler. */
export function defaultLibraryDirectory(): string {
  return path.dirname(ts.getDefaultLibFilePath({ target: ts.ScriptTarget.ES2022 }));
}

/** Build an environment without touching the process-wide one. */
export function createBaseEnvironment(options: PlaybenchConfig = {}): BaseEnvironment {
  const config = resolveConfig(options);
  const directory = defaultLibraryDirectory();

  const libraries = discoverLibraries(config.libs, (fileName) => ts.sys.readFile(path.join(directory, fileName))).map(
    (library): LibraryFile => ({ ...library, fileName: path.join(directory, library.fileName) }),
  );

  const backend = createTypeScriptBackend({ workingDirectory: config.workingDirectory });
  const baseUnit = backend.createBaseUnit(
    [...libraries, { fileName: FRAMEWORK_FILE_NAME, text: FRAMEWORK_DTS, kind: "framework" }],
    {
      name: config.assemblyName,
      suppressedDiagnostics: config.suppressedDiagnostics,
      componentBaseClass: config.componentBaseClass,
    },
  );
  const reference = baseUnit.asReference();

  debug.env("ready", { libraries: libraries.length, components: reference.components.length });

  return Object.freeze({
    config,
    backend,
    templateEngine: createTemplateEngine({ baseClass: config.componentBaseClass }),
    baseUnit,
    reference,
    libraries: Object.freeze(libraries.map((library) => library.fileName)),
  });
}

let baseEnvironment: BaseEnvironment | undefined;
let pending: Promise<BaseEnvironment> | undefined;

/**
 * Build the process-wide environment. Concurrent callers share one build; once it
 * succeeded, later calls return it and ignore `options`. A failed build can be retried.
 */
export function initBaseEnvironment(options?: PlaybenchConfig): Promise<BaseEnvironment> {
  if (baseEnvironment) return Promise.resolve(baseEnvironment);

  pending ??= Promise.resolve()
    .then(() => createBaseEnvironment(options))
    .then(
      (environment) => {
        baseEnvironment = environment;
        return environment;
      },
      (error: unknown) => {
        pending = undefined;
        throw error;
      },
    );
  return pending;
}

export function getBaseEnvironment(): BaseEnvironment {
  if (!baseEnvironment) {
    throw new CompilationInfrastructureError(
      "The base environment is not initialized. Call initBaseEnvironment() first.",
      InfrastructureErrorCode.ENV_NOT_INITIALIZED,
    );
  }
  return baseEnvironment;
}
