/**
 * TypeScript Language Backend
 *
 * Syntax units are `ts.SourceFile`s; link units are in-memory `ts.Program`s over
 * the base libraries plus the units. Library source files are parsed once when the
 * base unit is created and shared by every program derived from it.
 *
 * Programs compile scripts (no module system): generated components and plain
 * source files see each other's top-level declarations, like one assembly.
 */

import path from "node:path";
import ts from "typescript";
import { debug, type CompilationDiagnostic, type LineMap, type LinkReference } from "@playbench/shared";

import { collectComponents, type CatalogFile } from "./catalog.js";
import { toCompilationDiagnostic } from "./diagnostics.js";
import type { OutputBuffer } from "./output-buffer.js";
import type { LanguageBackend, LibraryFile, LinkOptions, LinkUnit, SyntaxUnit } from "./types.js";

export interface TypeScriptBackendOptions {
  /** Root the virtual user files live under, e.g. `/playbench/` */
  workingDirectory: string;
}

export const COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  strict: true,
  noLib: true,
  types: [],
  skipLibCheck: true,
  removeComments: true,
  newLine: ts.NewLineKind.LineFeed,
};

/**
 * Program file name for a caller path: normalized under the working directory and
 * always suffixed, so `a` and `a.ts` stay distinct while `/a`, `a` and `./a` coincide.
 */
export function virtualFileName(workingDirectory: string, filePath: string): string {
  return `${path.posix.join("/", workingDirectory, filePath)}.ts`;
}

export function createTypeScriptBackend(options: TypeScriptBackendOptions): LanguageBackend {
  return new TypeScriptBackend(options.workingDirectory);
}

/** Shared, immutable state of a base unit and everything derived from it. */
interface BaseState {
  readonly options: LinkOptions;
  readonly libraries: ReadonlyMap<string, ts.SourceFile>;
  readonly frameworkFiles: readonly string[];
}

class TypeScriptBackend implements LanguageBackend {
  constructor(private readonly workingDirectory: string) {}

  parse(code: string, filePath: string, lineMap?: LineMap): SyntaxUnit {
    const fileName = this.fileNameFor(filePath);
    const sourceFile = ts.createSourceFile(fileName, code, ts.ScriptTarget.ES2022, true, ts.ScriptKind.TS);
    return lineMap ? { filePath, fileName, sourceFile, lineMap } : { filePath, fileName, sourceFile };
  }

  createBaseUnit(libraries: readonly LibraryFile[], options: LinkOptions): LinkUnit {
    const parsed = new Map<string, ts.SourceFile>();
    const frameworkFiles: string[] = [];
    for (const library of libraries) {
      parsed.set(library.fileName, ts.createSourceFile(library.fileName, library.text, ts.ScriptTarget.ES2022, true, ts.ScriptKind.TS));
      if (library.kind === "framework") frameworkFiles.push(library.fileName);
    }
    debug.link("base.create", { name: options.name, libraries: parsed.size });
    return new TypeScriptLinkUnit({ options, libraries: parsed, frameworkFiles }, []);
  }

  fileNameFor(filePath: string): string {
    return virtualFileName(this.workingDirectory, filePath);
  }
}

class TypeScriptLinkUnit implements LinkUnit {
  #program: ts.Program | undefined;
  #reference: LinkReference | undefined;

  constructor(
    private readonly base: BaseState,
    readonly units: readonly SyntaxUnit[],
  ) {}

  get name(): string {
    return this.base.options.name;
  }

  addUnits(units: readonly SyntaxUnit[]): LinkUnit {
    return new TypeScriptLinkUnit(this.base, [...this.units, ...units]);
  }

  diagnostics(): readonly CompilationDiagnostic[] {
    const program = this.#getProgram();
    const suppressed = new Set(this.base.options.suppressedDiagnostics);
    const byFileName = new Map(this.units.map((unit) => [unit.fileName, unit]));

    const diagnostics = ts
      .getPreEmitDiagnostics(program)
      .filter((d) => d.category === ts.DiagnosticCategory.Error || d.category === ts.DiagnosticCategory.Warning)
      .filter((d) => !suppressed.has(d.code))
      .map((d) => toCompilationDiagnostic(d, byFileName));

    debug.link("diagnostics", { name: this.name, units: this.units.length, count: diagnostics.length });
    return diagnostics;
  }

  emit(buffer: OutputBuffer): boolean {
    const program = this.#getProgram();
    const outputs = new Map<string, string>();
    const result = program.emit(undefined, (fileName, text) => {
      outputs.set(fileName, text);
    });
    if (result.emitSkipped) return false;

    buffer.write(`/*! ${this.name} */\n`);
    for (const unit of this.units) {
      const text = outputs.get(unit.fileName.replace(/\.ts$/, ".js"));
      if (text !== undefined) buffer.write(text);
    }

    debug.link("emit", { name: this.name, files: outputs.size, bytes: buffer.length });
    return true;
  }

  asReference(): LinkReference {
    if (this.#reference) return this.#reference;

    const files: CatalogFile[] = [
      ...this.base.frameworkFiles.map((fileName): CatalogFile => ({ fileName, filePath: fileName, origin: "framework" })),
      ...this.units.map((unit): CatalogFile => ({ fileName: unit.fileName, filePath: unit.filePath, origin: "project" })),
    ];
    const components = collectComponents(this.#getProgram(), files, this.base.options.componentBaseClass);
    this.#reference = { name: this.name, components };

    debug.link("reference", { name: this.name, components: components.length });
    return this.#reference;
  }

  #getProgram(): ts.Program {
    this.#program ??= this.#createProgram();
    return this.#program;
  }

  #createProgram(): ts.Program {
    const files = new Map(this.base.libraries);
    for (const unit of this.units) files.set(unit.fileName, unit.sourceFile);

    const host: ts.CompilerHost = {
      getSourceFile: (fileName) => files.get(fileName),
      getDefaultLibFileName: () => "lib.d.ts",
      writeFile: () => {},
      getCurrentDirectory: () => "/",
      getCanonicalFileName: (fileName) => fileName,
      useCaseSensitiveFileNames: () => true,
      getNewLine: () => "\n",
      fileExists: (fileName) => files.has(fileName),
      readFile: (fileName) => files.get(fileName)?.text,
      getDirectories: () => [],
    };

    return ts.createProgram({
      rootNames: [...files.keys()],
      options: COMPILER_OPTIONS,
      host,
    });
  }
}
