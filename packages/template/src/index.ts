/**
 * @playbench/template
 *
 * Component template engine: turns `.view` templates into TypeScript classes.
 *
 * @example
 * ```typescript
 * import { createProjectItem, createTemplateEngine } from "@playbench/template";
 *
 * const engine = createTemplateEngine();
 * const item = createProjectItem("Counter.view", source);
 * const declaration = engine.processDeclarationOnly(item);
 * const full = engine.process(item, [frameworkReference, projectReference]);
 * ```
 */

export { createTemplateEngine } from "./engine.js";
export type { TemplateEngineOptions } from "./engine.js";

export { createProjectItem, DEFAULT_WORKING_DIRECTORY } from "./project-item.js";

export { TemplateDiagCode } from "./types.js";
export type { ProjectItem, TemplateDiagCodeType, TemplateEngine, TemplateOutput } from "./types.js";

export { componentNameFromPath, isValidIdentifier, toKebabCase, toPascalCase } from "./naming.js";
export { ComponentIndex, findComponentProperty } from "./component-index.js";

// Lower-level pieces (for tooling/testing)
export { findClosingBrace, scanTemplate } from "./scanner.js";
export type { CodeBlock, Injection, StructureIssue, TemplateStructure } from "./scanner.js";
export { splitInterpolation } from "./interpolation.js";
export type { InterpolationPart, InterpolationResult } from "./interpolation.js";
export { lowerMarkup } from "./markup.js";
export type { MarkupAttribute, MarkupElement, MarkupNode, MarkupText, MarkupTree } from "./markup.js";
