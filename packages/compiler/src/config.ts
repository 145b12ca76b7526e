/**
 * Compiler configuration: every knob is optional; `resolveConfig` fills the defaults.
 */

export interface PlaybenchConfig {
  /** Name stamped into the emitted assembly banner. */
  assemblyName?: string;
  /** Root the virtual source files live under. Must end with `/`. */
  workingDirectory?: string;
  /** Markup prepended to the first file when it is a template. */
  providerMarkup?: string;
  /** TypeScript standard libraries the base environment starts from, e.g. `es2022`. */
  libs?: readonly string[];
  /** TypeScript diagnostic codes dropped from link results. */
  suppressedDiagnostics?: readonly number[];
  /** Starting size of the emit buffer, in bytes. */
  initialBufferCapacity?: number;
  /** Class generated components extend; must be declared by the framework surface. */
  componentBaseClass?: string;
}

export type ResolvedConfig = Readonly<Required<PlaybenchConfig>>;

export const DEFAULT_ASSEMBLY_NAME = "Playbench.UserComponents";

export const DEFAULT_PROVIDER_MARKUP = `
<dialog-provider full-width.bind="true" max-width="extra-small"></dialog-provider>
<snackbar-provider></snackbar-provider>

`;

export const DEFAULT_CONFIG: ResolvedConfig = {
  assemblyName: DEFAULT_ASSEMBLY_NAME,
  workingDirectory: "/playbench/",
  providerMarkup: DEFAULT_PROVIDER_MARKUP,
  libs: ["es2022"],
  // TS2564: component properties are assigned by the host from element attributes
  suppressedDiagnostics: [2564],
  initialBufferCapacity: 512 * 1024,
  componentBaseClass: "Component",
};

export function resolveConfig(config: PlaybenchConfig = {}): ResolvedConfig {
  const workingDirectory = config.workingDirectory ?? DEFAULT_CONFIG.workingDirectory;
  return Object.freeze({
    assemblyName: config.assemblyName ?? DEFAULT_CONFIG.assemblyName,
    workingDirectory: workingDirectory.endsWith("/") ? workingDirectory : `${workingDirectory}/`,
    providerMarkup: config.providerMarkup ?? DEFAULT_CONFIG.providerMarkup,
    libs: Object.freeze([...(config.libs ?? DEFAULT_CONFIG.libs)]),
    suppressedDiagnostics: Object.freeze([...(config.suppressedDiagnostics ?? DEFAULT_CONFIG.suppressedDiagnostics)]),
    initialBufferCapacity: config.initialBufferCapacity ?? DEFAULT_CONFIG.initialBufferCapacity,
    componentBaseClass: config.componentBaseClass ?? DEFAULT_CONFIG.componentBaseClass,
  });
}
