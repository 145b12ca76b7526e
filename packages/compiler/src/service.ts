/**
 * Compilation Service
 *
 * Entry point for hosts: file set in, assembly result out. The last result is
 * cached by fingerprint; a repeated request returns the same object without
 * translating, linking or reporting status.
 */

import { debug, nullLogger, type CodeFile, type Logger } from "@playbench/shared";

import { CompilationCache, computeFingerprint } from "./cache.js";
import { getBaseEnvironment, initBaseEnvironment, type BaseEnvironment } from "./environment.js";
import { linkAssembly, type AssemblyResult } from "./linker.js";
import type { PlaybenchConfig } from "./config.js";
import { ProjectCompiler } from "./project.js";
import { createStatusReporter, StatusLabel, type StatusSink } from "./status.js";

export interface CompilationServiceOptions {
  /** Environment to compile against; defaults to the process-wide one */
  environment?: BaseEnvironment;
  logger?: Logger;
}

export class CompilationService {
  readonly #cache = new CompilationCache();
  readonly #environment: BaseEnvironment | undefined;
  readonly #logger: Logger;

  constructor(options: CompilationServiceOptions = {}) {
    this.#environment = options.environment;
    this.#logger = options.logger ?? nullLogger;
  }

  /** Build the process-wide base environment. */
  static init(config?: PlaybenchConfig): Promise<BaseEnvironment> {
    return initBaseEnvironment(config);
  }

  async compileToAssembly(files: readonly CodeFile[], onStatus?: StatusSink): Promise<AssemblyResult> {
    const fingerprint = computeFingerprint(files);
    const cached = this.#cache.lookup(fingerprint);
    if (cached) {
      debug.cache("hit", { files: files.length });
      return cached;
    }
    debug.cache("miss", { files: files.length });

    const env = this.#environment ?? getBaseEnvironment();
    const report = createStatusReporter(onStatus, this.#logger);

    const translations = new ProjectCompiler(env).translate(files, report);
    report(StatusLabel.COMPILING_ASSEMBLY);
    const result = linkAssembly(env, translations);

    this.#cache.store(fingerprint, result);
    this.#logger.info(
      `[compile] ${files.length} file(s), ${result.diagnostics.length} diagnostic(s), ` +
        (result.binaryImage ? `${result.binaryImage.length} bytes` : "no assembly"),
    );
    return result;
  }

  /** Forget the cached result. */
  invalidate(): void {
    this.#cache.clear();
  }
}
