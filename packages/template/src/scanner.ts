/**
 * Template Structure Scanner
 *
 * Splits a template into the parts the code generator treats differently:
 *
 * ```
 * @inject DialogService dialogs      → injected member
 * <h1>${this.title}</h1>            → markup (handed to parse5)
 * @code {                           → class members, copied verbatim
 *   title = "Hello";
 * }
 * ```
 *
 * Directives and code blocks are blanked out of the markup (newlines kept), so markup
 * offsets reported by parse5 are offsets into the original template.
 */

import { TemplateDiagCode, type TemplateDiagCodeType } from "./types.js";

export interface CodeBlock {
  /** Text between the braces */
  body: string;
  /** Offset of the first body character */
  bodyOffset: number;
  /** Offset of `@code` */
  directiveOffset: number;
}

export interface Injection {
  typeName: string;
  memberName: string;
  offset: number;
}

export interface StructureIssue {
  code: TemplateDiagCodeType;
  message: string;
  offset: number;
}

export interface TemplateStructure {
  codeBlocks: CodeBlock[];
  injections: Injection[];
  markup: string;
  issues: StructureIssue[];
}

const INJECT_DIRECTIVE = /^@inject\s+([A-Za-z_$][\w$.]*)\s+([A-Za-z_$][\w$]*)\s*;?$/;

export function scanTemplate(text: string): TemplateStructure {
  const codeBlocks: CodeBlock[] = [];
  const injections: Injection[] = [];
  const issues: StructureIssue[] = [];
  const blanked: [number, number][] = [];

  let pos = 0;
  while (pos < text.length) {
    const newline = text.indexOf("\n", pos);
    const lineEnd = newline < 0 ? text.length : newline;
    let start = pos;
    while (start < lineEnd && (text[start] === " " || text[start] === "\t")) start++;

    if (startsDirective(text, start, "@code")) {
      let open = start + "@code".length;
      while (open < text.length && /\s/.test(text.charAt(open))) open++;

      if (text[open] !== "{") {
        issues.push({
          code: TemplateDiagCode.UNTERMINATED_CODE_BLOCK,
          message: "Expected '{' after the @code directive.",
          offset: start,
        });
        blanked.push([start, lineEnd]);
        pos = lineEnd + 1;
        continue;
      }

      const close = findClosingBrace(text, open);
      if (close < 0) {
        issues.push({
          code: TemplateDiagCode.UNTERMINATED_CODE_BLOCK,
          message: "The @code block is missing a closing '}' character.",
          offset: start,
        });
        blanked.push([start, text.length]);
        break;
      }

      codeBlocks.push({ body: text.slice(open + 1, close), bodyOffset: open + 1, directiveOffset: start });
      blanked.push([start, close + 1]);
      pos = close + 1;
      continue;
    }

    if (startsDirective(text, start, "@inject")) {
      const match = INJECT_DIRECTIVE.exec(text.slice(start, lineEnd).trim());
      if (match?.[1] && match[2]) {
        injections.push({ typeName: match[1], memberName: match[2], offset: start });
      } else {
        issues.push({
          code: TemplateDiagCode.MALFORMED_INJECT,
          message: "The 'inject' directive expects a type name followed by a member name.",
          offset: start,
        });
      }
      blanked.push([start, lineEnd]);
    }

    pos = lineEnd + 1;
  }

  return { codeBlocks, injections, markup: blank(text, blanked), issues };
}

function startsDirective(text: string, at: number, directive: string): boolean {
  if (!text.startsWith(directive, at)) return false;
  const next = text.charAt(at + directive.length);
  return next === "" || next === "{" || /\s/.test(next);
}

function blank(text: string, ranges: readonly [number, number][]): string {
  if (ranges.length === 0) return text;
  const chars = text.split("");
  for (const [start, end] of ranges) {
    for (let i = start; i < end; i++) {
      if (chars[i] !== "\n") chars[i] = " ";
    }
  }
  return chars.join("");
}

/* =============================================================================
 * BRACE MATCHING
 * ============================================================================= */

/**
 * Index of the `}` matching the `{` at `open`, or -1. Strings, template literals
 * (including nested `${}`) and comments are skipped.
 */
export function findClosingBrace(text: string, open: number): number {
  let depth = 0;
  let i = open;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    } else if (ch === '"' || ch === "'") {
      i = skipQuoted(text, i, ch);
      continue;
    } else if (ch === "`") {
      i = skipTemplateLiteral(text, i);
      if (i < 0) return -1;
      continue;
    } else if (ch === "/" && text[i + 1] === "/") {
      i = text.indexOf("\n", i);
      if (i < 0) return -1;
      continue;
    } else if (ch === "/" && text[i + 1] === "*") {
      const end = text.indexOf("*/", i + 2);
      if (end < 0) return -1;
      i = end + 2;
      continue;
    }
    i++;
  }
  return -1;
}

/** Index just past the closing quote; an unterminated string stops at the newline. */
function skipQuoted(text: string, at: number, quote: string): number {
  let i = at + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === quote) return i + 1;
    if (ch === "\n") return i;
    i++;
  }
  return i;
}

function skipTemplateLiteral(text: string, at: number): number {
  let i = at + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === "`") return i + 1;
    if (ch === "$" && text[i + 1] === "{") {
      const close = findClosingBrace(text, i + 1);
      if (close < 0) return -1;
      i = close + 1;
      continue;
    }
    i++;
  }
  return -1;
}
