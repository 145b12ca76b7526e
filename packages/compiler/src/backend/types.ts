import type ts from "typescript";
import type { CompilationDiagnostic, LineMap, LinkReference } from "@playbench/shared";

import type { OutputBuffer } from "./output-buffer.js";

/* =============================================================================
 * LANGUAGE BACKEND CONTRACT
 * -----------------------------------------------------------------------------
 * The project compiler and the linker only talk to these interfaces; the
 * TypeScript compiler API stays behind `createTypeScriptBackend`.
 * ============================================================================= */

/** One parsed source file, tagged with the path the caller knows it by. */
export interface SyntaxUnit {
  /** Caller's original path; diagnostics report this one */
  readonly filePath: string;
  /** Virtual file name inside the program, e.g. `/playbench/Counter.view.ts` */
  readonly fileName: string;
  readonly sourceFile: ts.SourceFile;
  /** Generated line → template position, for translated templates */
  readonly lineMap?: LineMap;
}

export type LibraryKind = "lib" | "framework";

/** Declaration-only file that is part of every program but never emitted. */
export interface LibraryFile {
  readonly fileName: string;
  readonly text: string;
  readonly kind: LibraryKind;
}

export interface LinkOptions {
  /** Unit name; also stamped into the emitted banner */
  readonly name: string;
  /** Numeric TypeScript codes dropped from `diagnostics()` */
  readonly suppressedDiagnostics: readonly number[];
  /** Class whose descendants `asReference()` reports as components */
  readonly componentBaseClass: string;
}

/**
 * Immutable set of syntax units linked against the base libraries.
 * `addUnits` returns a new unit; analysis runs lazily and at most once per unit.
 */
export interface LinkUnit {
  readonly name: string;
  readonly units: readonly SyntaxUnit[];
  addUnits(units: readonly SyntaxUnit[]): LinkUnit;
  /** Warnings and errors, suppressed codes removed. */
  diagnostics(): readonly CompilationDiagnostic[];
  /** Writes the executable image; false when the backend skipped emit. */
  emit(buffer: OutputBuffer): boolean;
  /** Metadata-only view for template lookups. */
  asReference(): LinkReference;
}

export interface LanguageBackend {
  /** Program file name `parse` gives `filePath`; equal names denote the same file. */
  fileNameFor(filePath: string): string;
  parse(code: string, filePath: string, lineMap?: LineMap): SyntaxUnit;
  createBaseUnit(libraries: readonly LibraryFile[], options: LinkOptions): LinkUnit;
}
