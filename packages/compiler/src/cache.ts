import { stableHash, type CodeFile } from "@playbench/shared";

import type { AssemblyResult } from "./linker.js";

/** Order-sensitive fingerprint of `(path, content)` pairs; file types are not part of it. */
export function computeFingerprint(files: readonly CodeFile[]): string {
  return stableHash(files.map((file) => [file.path, file.content]));
}

interface CacheSlot {
  readonly fingerprint: string;
  readonly result: AssemblyResult;
}

/**
 * Single-slot cache of the last assembly result. The slot is one frozen record that is
 * replaced whole, so a reader never sees a fingerprint paired with another run's result.
 */
export class CompilationCache {
  #slot: CacheSlot | null = null;

  get fingerprint(): string | undefined {
    return this.#slot?.fingerprint;
  }

  lookup(fingerprint: string): AssemblyResult | undefined {
    const slot = this.#slot;
    return slot && slot.fingerprint === fingerprint ? slot.result : undefined;
  }

  /** Freezes `result` and its diagnostics; every later hit hands out this object. */
  store(fingerprint: string, result: AssemblyResult): void {
    for (const diagnostic of result.diagnostics) {
      if (diagnostic.location) Object.freeze(diagnostic.location);
      Object.freeze(diagnostic);
    }
    Object.freeze(result.diagnostics);
    this.#slot = Object.freeze({ fingerprint, result: Object.freeze(result) });
  }

  clear(): void {
    this.#slot = null;
  }
}
