/**
 * Code Writer
 *
 * Line-oriented output with indentation and per-line source anchors.
 */

import type { SourceAnchor } from "@playbench/shared";

export class CodeWriter {
  readonly #lines: string[] = [];
  readonly #anchors: (SourceAnchor | null)[] = [];
  #depth = 0;

  constructor(private readonly indentUnit: string = "  ") {}

  /**
   * Write an indented line. An anchor's `generatedColumn` is relative to the text
   * and gets shifted by the current indentation.
   */
  line(text: string, anchor?: SourceAnchor | null): this {
    const indent = this.indentUnit.repeat(this.#depth);
    this.#lines.push(text.length > 0 ? indent + text : "");
    this.#anchors.push(anchor ? { ...anchor, generatedColumn: anchor.generatedColumn + indent.length } : null);
    return this;
  }

  /** Write a line exactly as given (verbatim user code). */
  raw(text: string, anchor?: SourceAnchor | null): this {
    this.#lines.push(text);
    this.#anchors.push(anchor ?? null);
    return this;
  }

  indent(): this {
    this.#depth++;
    return this;
  }

  dedent(): this {
    this.#depth = Math.max(0, this.#depth - 1);
    return this;
  }

  get lineMap(): readonly (SourceAnchor | null)[] {
    return this.#anchors;
  }

  toString(): string {
    return this.#lines.length === 0 ? "" : this.#lines.join("\n") + "\n";
  }
}

/* =============================================================================
 * STRING ESCAPING
 * ============================================================================= */

/** Double-quoted JavaScript string literal. */
export function stringLiteral(str: string): string {
  return JSON.stringify(str);
}

/** Escape text for use inside a JavaScript template literal. */
export function escapeTemplateLiteral(str: string): string {
  return str
    .replace(/\\/g, "\\\\")
    .replace(/`/g, "\\`")
    .replace(/\$\{/g, "\\${");
}
