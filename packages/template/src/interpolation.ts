import { findClosingBrace } from "./scanner.js";

export type InterpolationPart =
  | { kind: "text"; text: string }
  | { kind: "expr"; code: string; /** offset of the expression text, relative to the input */ offset: number };

export interface InterpolationResult {
  parts: InterpolationPart[];
  /** Relative offset of an unterminated `${`, if any */
  unterminatedAt?: number;
  /** Relative offsets of `${}` with nothing inside */
  empty: number[];
}

/**
 * Split `Hello ${this.name}!` into text and expression parts. An unterminated
 * `${` turns the remainder into text.
 */
export function splitInterpolation(text: string): InterpolationResult {
  const parts: InterpolationPart[] = [];
  const empty: number[] = [];
  let last = 0;

  for (;;) {
    const start = text.indexOf("${", last);
    if (start < 0) break;

    const close = findClosingBrace(text, start + 1);
    if (close < 0) {
      pushText(parts, text.slice(last));
      return { parts, unterminatedAt: start, empty };
    }

    pushText(parts, text.slice(last, start));
    const code = text.slice(start + 2, close);
    if (code.trim().length === 0) {
      empty.push(start);
    } else {
      parts.push({ kind: "expr", code, offset: start + 2 });
    }
    last = close + 1;
  }

  pushText(parts, text.slice(last));
  return { parts, empty };
}

export function hasInterpolation(text: string): boolean {
  return text.includes("${");
}

function pushText(parts: InterpolationPart[], text: string): void {
  if (text.length > 0) parts.push({ kind: "text", text });
}
