import { parseFragment } from "parse5";
import type { DefaultTreeAdapterMap } from "parse5";

import { TemplateDiagCode } from "./types.js";
import type { StructureIssue } from "./scanner.js";

type P5Node = DefaultTreeAdapterMap["childNode"];
type P5Element = DefaultTreeAdapterMap["element"];
type P5Text = DefaultTreeAdapterMap["textNode"];
type P5Template = DefaultTreeAdapterMap["template"];

export interface MarkupAttribute {
  /** Lower-cased by the HTML parser, including any `.bind` / `.trigger` suffix */
  name: string;
  value: string;
  /** Offset of the value's first character (best effort for unquoted values) */
  valueOffset: number;
  offset: number;
}

export interface MarkupElement {
  kind: "element";
  tagName: string;
  attrs: MarkupAttribute[];
  children: MarkupNode[];
  offset: number;
}

export interface MarkupText {
  kind: "text";
  value: string;
  offset: number;
}

export type MarkupNode = MarkupElement | MarkupText;

export interface MarkupTree {
  nodes: MarkupNode[];
  issues: StructureIssue[];
}

function isElement(n: P5Node): n is P5Element {
  return "tagName" in n;
}

function isText(n: P5Node): n is P5Text {
  return n.nodeName === "#text";
}

function isTemplate(n: P5Element): n is P5Template {
  return n.tagName === "template" && "content" in n;
}

/** Parse markup with parse5 and keep only what code generation needs. */
export function lowerMarkup(markup: string): MarkupTree {
  const issues: StructureIssue[] = [];
  const fragment = parseFragment(markup, {
    sourceCodeLocationInfo: true,
    onParseError: (err) => {
      issues.push({
        code: TemplateDiagCode.HTML_PARSE_ERROR,
        message: `HTML parse error: ${err.code}`,
        offset: err.startOffset,
      });
    },
  });
  return { nodes: lowerChildren(fragment.childNodes), issues };
}

function lowerChildren(nodes: readonly P5Node[]): MarkupNode[] {
  const out: MarkupNode[] = [];
  for (const node of nodes) {
    if (isText(node)) {
      out.push({ kind: "text", value: node.value, offset: node.sourceCodeLocation?.startOffset ?? 0 });
    } else if (isElement(node)) {
      out.push(lowerElement(node));
    }
    // comments and doctypes carry nothing to render
  }
  return out;
}

function lowerElement(el: P5Element): MarkupElement {
  const loc = el.sourceCodeLocation;
  const attrs: MarkupAttribute[] = el.attrs.map((attr) => {
    const attrLoc = loc?.attrs?.[attr.name];
    const offset = attrLoc?.startOffset ?? loc?.startOffset ?? 0;
    // name="value": the value starts after the name, '=' and the opening quote
    return { name: attr.name, value: attr.value, offset, valueOffset: offset + attr.name.length + 2 };
  });
  const childNodes = isTemplate(el) ? el.content.childNodes : el.childNodes;
  return {
    kind: "element",
    tagName: el.tagName,
    attrs,
    children: lowerChildren(childNodes),
    offset: loc?.startOffset ?? 0,
  };
}
