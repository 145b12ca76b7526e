/**
 * Project Compiler
 *
 * Two-phase translation of a file set:
 *
 *   1. declaration pass: every template becomes a class shell (no `render()`), which
 *      is linked against the base unit so the checker can see every component class;
 *   2. full pass: templates are translated again with the framework reference and the
 *      phase-1 reference, so tags resolve to components declared anywhere in the set.
 *
 * Failures come back as a single synthetic result (empty path, no code) holding the
 * diagnostics; nothing here throws for problems in the user's files.
 */

import {
  buildDiagnostic,
  debug,
  hasErrors,
  type CodeFile,
  type CompilationDiagnostic,
  type LineMap,
} from "@playbench/shared";
import { createProjectItem, type ProjectItem, type TemplateOutput } from "@playbench/template";

import type { BaseEnvironment } from "./environment.js";
import { StatusLabel, type StatusReporter } from "./status.js";

export interface TranslationResult {
  /** Caller's path; empty for the synthetic result of an aborted run */
  readonly filePath: string;
  readonly generatedCode: string;
  readonly diagnostics: readonly CompilationDiagnostic[];
  readonly projectItem?: ProjectItem;
  readonly lineMap?: LineMap;
}

export const ProjectDiagCode = {
  DUPLICATE_PATH: "PB0001",
} as const;

/** Template prepared for both passes. */
interface TemplateSource {
  item: ProjectItem;
  /** Lines of the item that precede the caller's first line (may be negative) */
  lineShift: number;
}

export class ProjectCompiler {
  constructor(private readonly env: BaseEnvironment) {}

  translate(files: readonly CodeFile[], report: StatusReporter = () => {}): TranslationResult[] {
    const duplicates = findDuplicatePaths(files, (path) => this.env.backend.fileNameFor(path));
    if (duplicates.length > 0) {
      return [
        abortResult(
          duplicates.map((path) =>
            buildDiagnostic({
              code: ProjectDiagCode.DUPLICATE_PATH,
              message: `The file path '${path}' is used by more than one file.`,
              stage: "project",
            }),
          ),
        ),
      ];
    }

    const { backend, baseUnit, config, templateEngine } = this.env;

    const sources = files.map((file, index) =>
      file.type === "template" ? this.#prepareTemplate(file, index === 0 ? config.providerMarkup : "") : null,
    );

    // Phase 1: class shells only
    const declarations = files.map((file, index): TranslationResult => {
      const source = sources[index];
      if (!source) return { filePath: file.path, generatedCode: file.content, diagnostics: [] };
      return toResult(file.path, source, templateEngine.processDeclarationOnly(source.item));
    });

    const declarationDiagnostics = declarations.flatMap((result) => result.diagnostics);
    debug.project("declarations", { files: files.length, diagnostics: declarationDiagnostics.length });
    if (hasErrors(declarationDiagnostics)) {
      return [abortResult(declarationDiagnostics)];
    }

    const tempUnit = baseUnit.addUnits(
      declarations.map((result) => backend.parse(result.generatedCode, result.filePath, result.lineMap)),
    );
    const tempDiagnostics = tempUnit.diagnostics();
    if (hasErrors(tempDiagnostics)) {
      debug.project("declarations.link.failed", { diagnostics: tempDiagnostics.length });
      return [abortResult([...tempDiagnostics, ...declarationDiagnostics])];
    }
    const tempReference = tempUnit.asReference();

    report(StatusLabel.PREPARING_PROJECT);

    // Phase 2: full translation against framework + project components
    const references = [this.env.reference, tempReference];
    const results = files.map((file, index): TranslationResult => {
      const source = sources[index];
      if (!source) return { filePath: file.path, generatedCode: file.content, diagnostics: [] };
      return toResult(file.path, source, templateEngine.process(source.item, references));
    });

    debug.project("translated", {
      files: results.length,
      components: tempReference.components.length,
      diagnostics: results.reduce((sum, result) => sum + result.diagnostics.length, 0),
    });
    return results;
  }

  #prepareTemplate(file: CodeFile, prefix: string): TemplateSource {
    const item = createProjectItem(file.path, prefix + file.content, this.env.config.workingDirectory);

    const normalized = (prefix + file.content).replace(/\r/g, "");
    const trimmed = normalized.length - normalized.trimStart().length;
    const lineShift = countLines(prefix.replace(/\r/g, "")) - countLines(normalized.slice(0, trimmed));
    return { item, lineShift };
  }
}

/** Single result of a run that stopped before the full pass. */
function abortResult(diagnostics: readonly CompilationDiagnostic[]): TranslationResult {
  return { filePath: "", generatedCode: "", diagnostics };
}

function toResult(filePath: string, source: TemplateSource, output: TemplateOutput): TranslationResult {
  const { lineShift } = source;
  if (lineShift === 0) {
    return { filePath, generatedCode: output.generatedCode, diagnostics: output.diagnostics, projectItem: source.item, lineMap: output.lineMap };
  }

  // Report positions in the caller's file rather than the prefixed item
  const diagnostics = output.diagnostics.map((diagnostic) =>
    diagnostic.location
      ? { ...diagnostic, location: { ...diagnostic.location, line: Math.max(1, diagnostic.location.line - lineShift) } }
      : diagnostic,
  );
  const lineMap = output.lineMap.map((anchor) =>
    anchor ? { ...anchor, line: Math.max(0, anchor.line - lineShift) } : null,
  );
  return { filePath, generatedCode: output.generatedCode, diagnostics, projectItem: source.item, lineMap };
}

function countLines(text: string): number {
  let count = 0;
  for (const ch of text) if (ch === "\n") count++;
  return count;
}

/** Paths naming a file already named earlier in the set, once the backend normalizes them. */
function findDuplicatePaths(files: readonly CodeFile[], fileNameFor: (path: string) => string): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const file of files) {
    const fileName = fileNameFor(file.path);
    if (seen.has(fileName)) duplicates.add(file.path);
    seen.add(fileName);
  }
  return [...duplicates];
}
