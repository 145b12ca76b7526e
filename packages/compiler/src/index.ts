/**
 * @playbench/compiler
 *
 * Compiles a playground file set (component templates plus plain sources) into a
 * single in-memory assembly.
 *
 * @example
 * ```typescript
 * import { CompilationService } from "@playbench/compiler";
 *
 * await CompilationService.init();
 * const service = new CompilationService({ logger: console });
 * const result = await service.compileToAssembly(files, (label) => ui.setStatus(label));
 * if (result.binaryImage) run(result.binaryImage);
 * ```
 */

// Service and cache
export { CompilationService } from "./service.js";
export type { CompilationServiceOptions } from "./service.js";
export { CompilationCache, computeFingerprint } from "./cache.js";
export { createStatusReporter, StatusLabel } from "./status.js";
export type { StatusReporter, StatusSink } from "./status.js";

// Pipeline stages
export { ProjectCompiler, ProjectDiagCode } from "./project.js";
export type { TranslationResult } from "./project.js";
export { linkAssembly } from "./linker.js";
export type { AssemblyResult } from "./linker.js";

// Environment
export {
  createBaseEnvironment,
  defaultLibraryDirectory,
  discoverLibraries,
  getBaseEnvironment,
  initBaseEnvironment,
} from "./environment.js";
export type { BaseEnvironment, LibraryReader } from "./environment.js";
export { DEFAULT_CONFIG, DEFAULT_PROVIDER_MARKUP, resolveConfig } from "./config.js";
export type { PlaybenchConfig, ResolvedConfig } from "./config.js";
export { FRAMEWORK_DTS, FRAMEWORK_FILE_NAME } from "./framework.js";

// Backend
export { createTypeScriptBackend, COMPILER_OPTIONS, virtualFileName } from "./backend/typescript.js";
export type { TypeScriptBackendOptions } from "./backend/typescript.js";
export { OutputBuffer } from "./backend/output-buffer.js";
export type { LanguageBackend, LibraryFile, LibraryKind, LinkOptions, LinkUnit, SyntaxUnit } from "./backend/types.js";

// Errors
export { CompilationInfrastructureError, InfrastructureErrorCode } from "./errors.js";
export type { InfrastructureErrorCodeType } from "./errors.js";
