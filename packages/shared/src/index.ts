// Shared package public API
//
// Data model, diagnostics, logging and hashing used across the playbench packages.

export type { CodeFile, CodeFileType, ComponentDescriptor, ComponentOrigin, ComponentProperty, LinkReference } from "./model.js";

export { buildDiagnostic, formatDiagnostic, hasErrors, isError } from "./diagnostics.js";
export type {
  BuildDiagnosticInput,
  CompilationDiagnostic,
  DiagnosticLocation,
  DiagnosticSeverity,
  DiagnosticStage,
} from "./diagnostics.js";

export { mapGeneratedPosition } from "./source-map.js";
export type { LineMap, MappedPosition, SourceAnchor } from "./source-map.js";

export { nullLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export { configureDebug, debug, formatDebugMessage, isDebugEnabled, refreshDebugChannels } from "./debug.js";
export type { Debug, DebugChannel, DebugConfig, DebugData } from "./debug.js";

export { stableHash, stableSerialize } from "./hash.js";
