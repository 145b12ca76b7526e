/**
 * Debug Channels
 *
 * Targeted, structured logging of what flows through the pipeline. Complements the
 * injected `Logger` (which reports milestones to the host): channels are for developers
 * looking at one subsystem at a time.
 *
 * Enable via environment variable:
 * ```bash
 * PLAYBENCH_DEBUG=cache npm test        # Just the compilation cache
 * PLAYBENCH_DEBUG=translate,link npm test
 * PLAYBENCH_DEBUG=* npm test            # Everything
 * ```
 *
 * Disabled channels are no-op functions, so call sites stay in the code.
 */

export type DebugData = Record<string, unknown>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  format: "json" | "pretty";
  timestamps: boolean;
  /** Defaults to console.log */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.log,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env["PLAYBENCH_DEBUG"] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

export function formatDebugMessage(channel: string, point: string, data: DebugData | undefined): string {
  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";

  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `${prefix}${label} { ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.length === 0 ? "[]" : `[${value.length} items]`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatDebugMessage(name, point, data));
  };
}

/**
 * Re-read PLAYBENCH_DEBUG and rebuild the channels.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.translate = createChannel("translate");
  debug.project = createChannel("project");
  debug.link = createChannel("link");
  debug.cache = createChannel("cache");
  debug.env = createChannel("env");
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Template structure scanning and code generation */
  translate: createChannel("translate"),

  /** Two-phase project translation */
  project: createChannel("project"),

  /** Backend link units, reference extraction and emit */
  link: createChannel("link"),

  /** Compilation cache hits and misses */
  cache: createChannel("cache"),

  /** Base environment bootstrap */
  env: createChannel("env"),
};

export type Debug = typeof debug;
