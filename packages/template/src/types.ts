import type { CompilationDiagnostic, LineMap, LinkReference } from "@playbench/shared";

/* =============================================================================
 * PROJECT ITEMS
 * ============================================================================= */

/** A template file prepared for the engine: normalized paths plus UTF-8 bytes. */
export interface ProjectItem {
  /** Working directory the physical path is rooted at, e.g. `/playbench/` */
  basePath: string;
  /** Always of the form `/a/b/c.view` */
  filePath: string;
  /** `basePath` + caller path */
  physicalPath: string;
  /** Path as the caller supplied it; diagnostics report this one */
  fileName: string;
  content: Uint8Array;
}

/* =============================================================================
 * ENGINE CONTRACT
 * ============================================================================= */

export interface TemplateOutput {
  generatedCode: string;
  diagnostics: CompilationDiagnostic[];
  lineMap: LineMap;
}

export interface TemplateEngine {
  /** Declaration pass: class shape only, markup is not interpreted, no references. */
  processDeclarationOnly(item: ProjectItem): TemplateOutput;
  /** Full pass: adds `render()` and resolves component tags against `references`. */
  process(item: ProjectItem, references: readonly LinkReference[]): TemplateOutput;
}

/* =============================================================================
 * DIAGNOSTIC CODES
 * ============================================================================= */

export const TemplateDiagCode = {
  /** `@code` without a matching `}` (or without `{`) */
  UNTERMINATED_CODE_BLOCK: "TPL0001",
  MALFORMED_INJECT: "TPL0002",
  UNTERMINATED_INTERPOLATION: "TPL0003",
  INVALID_COMPONENT_NAME: "TPL0004",
  EMPTY_INTERPOLATION: "TPL0005",
  HTML_PARSE_ERROR: "TPL0100",
  UNKNOWN_ELEMENT: "TPL1001",
  UNKNOWN_COMPONENT_PROPERTY: "TPL1002",
} as const;

export type TemplateDiagCodeType = (typeof TemplateDiagCode)[keyof typeof TemplateDiagCode];
