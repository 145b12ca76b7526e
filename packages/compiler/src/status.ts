import type { Logger } from "@playbench/shared";

/** Host callback receiving progress labels such as `"Preparing Project"`. */
export type StatusSink = (label: string) => void | PromiseLike<void>;

export type StatusReporter = (label: string) => void;

export const StatusLabel = {
  PREPARING_PROJECT: "Preparing Project",
  COMPILING_ASSEMBLY: "Compiling Assembly",
} as const;

/**
 * Fire-and-forget wrapper around a sink. The pipeline never waits for the sink, and
 * a sink that throws or rejects is logged, not propagated.
 */
export function createStatusReporter(sink: StatusSink | undefined, logger: Logger): StatusReporter {
  if (!sink) return () => {};

  const report = (label: string, error: unknown): void => {
    const reason = hasMessage(error) ? error.message : String(error);
    logger.warn(`[compile] status callback failed for '${label}': ${reason}`);
  };

  return (label) => {
    try {
      const result = sink(label);
      if (isThenable(result)) {
        void Promise.resolve(result).catch((error: unknown) => report(label, error));
      }
    } catch (error) {
      report(label, error);
    }
  };
}

// Promises from other realms and hand-rolled thenables fail `instanceof Promise`
function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}

function hasMessage(error: unknown): error is { message: string } {
  return typeof error === "object" && error !== null && "message" in error && typeof error.message === "string";
}
