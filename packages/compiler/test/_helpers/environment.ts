import type { CodeFile, Logger } from "@playbench/shared";
import { vi } from "vitest";

import { createBaseEnvironment, type BaseEnvironment } from "../../src/environment.js";

let shared: BaseEnvironment | undefined;

/**
 * Base environment built once per test file. Building it parses the standard
 * libraries, so suites share one instance instead of touching the process-wide one.
 */
export function testEnvironment(): BaseEnvironment {
  shared ??= createBaseEnvironment();
  return shared;
}

export function template(path: string, content: string): CodeFile {
  return { path, content, type: "template" };
}

export function source(path: string, content: string): CodeFile {
  return { path, content, type: "source" };
}

export function createTestLogger() {
  return {
    log: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

const decoder = new TextDecoder();

export function decodeImage(image: Uint8Array | undefined): string {
  return image ? decoder.decode(image) : "";
}
