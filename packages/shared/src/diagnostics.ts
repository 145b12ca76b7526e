/* =======================================================================================
 * DIAGNOSTIC MODEL
 * ---------------------------------------------------------------------------------------
 * Shared by the template engine (translate), the project compiler (project) and the
 * language backend (link). Diagnostics are plain data.
 * ======================================================================================= */

export type DiagnosticSeverity = "error" | "warning" | "info";

/** Stage tags where the diagnostic was produced. */
export type DiagnosticStage = "translate" | "project" | "link";

/** 1-based position in the caller's original file. */
export interface DiagnosticLocation {
  file: string;
  line: number;
  column: number;
}

export interface CompilationDiagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  stage: DiagnosticStage;
  location?: DiagnosticLocation;
}

export interface BuildDiagnosticInput {
  code: string;
  message: string;
  stage: DiagnosticStage;
  severity?: DiagnosticSeverity;
  location?: DiagnosticLocation | null;
}

/** Centralized diagnostic builder; severity defaults to "error". */
export function buildDiagnostic(input: BuildDiagnosticInput): CompilationDiagnostic {
  return {
    code: input.code,
    message: input.message,
    severity: input.severity ?? "error",
    stage: input.stage,
    ...(input.location ? { location: input.location } : {}),
  };
}

export function isError(diag: CompilationDiagnostic): boolean {
  return diag.severity === "error";
}

export function hasErrors(diags: readonly CompilationDiagnostic[]): boolean {
  return diags.some(isError);
}

/** Render as `file(line,col): severity CODE: message`, the shape editors pick up. */
export function formatDiagnostic(diag: CompilationDiagnostic): string {
  const where = diag.location ? `${diag.location.file}(${diag.location.line},${diag.location.column}): ` : "";
  return `${where}${diag.severity} ${diag.code}: ${diag.message}`;
}
