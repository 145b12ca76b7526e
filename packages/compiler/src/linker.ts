import { debug, hasErrors, type CompilationDiagnostic } from "@playbench/shared";

import { OutputBuffer } from "./backend/output-buffer.js";
import type { BaseEnvironment } from "./environment.js";
import { CompilationInfrastructureError, InfrastructureErrorCode } from "./errors.js";
import type { TranslationResult } from "./project.js";

export interface AssemblyResult {
  readonly diagnostics: readonly CompilationDiagnostic[];
  /** Present exactly when no diagnostic is an error */
  readonly binaryImage?: Uint8Array;
}

/**
 * Link translated files against the base unit and emit the assembly.
 *
 * Translation errors short-circuit: nothing is parsed and the carried diagnostics
 * come back as they are. Otherwise link diagnostics come first, then the carried ones.
 */
export function linkAssembly(env: BaseEnvironment, results: readonly TranslationResult[]): AssemblyResult {
  const carried = results.flatMap((result) => result.diagnostics);
  if (hasErrors(carried)) {
    debug.link("skipped", { diagnostics: carried.length });
    return { diagnostics: carried };
  }

  const units = results.map((result) => env.backend.parse(result.generatedCode, result.filePath, result.lineMap));
  const unit = env.baseUnit.addUnits(units);
  const diagnostics = [...unit.diagnostics(), ...carried];
  if (hasErrors(diagnostics)) {
    return { diagnostics };
  }

  const buffer = new OutputBuffer(env.config.initialBufferCapacity);
  if (!unit.emit(buffer)) {
    throw new CompilationInfrastructureError(
      `Emit of '${unit.name}' was skipped without reporting an error.`,
      InfrastructureErrorCode.EMIT_FAILED,
    );
  }
  return { diagnostics, binaryImage: buffer.toBytes() };
}
