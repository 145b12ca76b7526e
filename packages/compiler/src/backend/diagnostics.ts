import ts from "typescript";
import {
  buildDiagnostic,
  mapGeneratedPosition,
  type CompilationDiagnostic,
  type DiagnosticLocation,
  type DiagnosticSeverity,
} from "@playbench/shared";

import type { SyntaxUnit } from "./types.js";

export function toSeverity(category: ts.DiagnosticCategory): DiagnosticSeverity {
  switch (category) {
    case ts.DiagnosticCategory.Error:
      return "error";
    case ts.DiagnosticCategory.Warning:
      return "warning";
    default:
      return "info";
  }
}

/**
 * Convert a checker diagnostic, mapping its position back to the caller's file.
 * Positions inside translated templates go through the unit's line map.
 */
export function toCompilationDiagnostic(
  diagnostic: ts.Diagnostic,
  unitsByFileName: ReadonlyMap<string, SyntaxUnit>,
): CompilationDiagnostic {
  let location: DiagnosticLocation | null = null;
  if (diagnostic.file && diagnostic.start !== undefined) {
    const unit = unitsByFileName.get(diagnostic.file.fileName);
    const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
    const mapped = mapGeneratedPosition(unit?.lineMap, line, character);
    location = {
      file: unit?.filePath ?? diagnostic.file.fileName,
      line: mapped.line + 1,
      column: mapped.column + 1,
    };
  }

  return buildDiagnostic({
    code: `TS${diagnostic.code}`,
    message: ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n"),
    severity: toSeverity(diagnostic.category),
    stage: "link",
    location,
  });
}
