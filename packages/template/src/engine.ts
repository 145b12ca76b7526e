/**
 * Template Engine
 *
 * Translates one template into a TypeScript class deriving from the framework's
 * `Component`:
 *
 * ```
 * // /user-card.view
 * class UserCard extends Component {
 *   readonly dialogs = inject(DialogService);   ← @inject
 *   name = "";                                  ← @code, verbatim
 *
 *   render(): Child[] {                         ← full pass only
 *     return [
 *       h("h2", null, [
 *         (this.name),
 *       ]),
 *     ];
 *   }
 * }
 * ```
 *
 * The declaration pass stops before `render()`, so it needs no knowledge of other
 * components. The full pass resolves component tags through the given references.
 */

import {
  buildDiagnostic,
  debug,
  type CompilationDiagnostic,
  type ComponentDescriptor,
  type DiagnosticSeverity,
  type LinkReference,
  type SourceAnchor,
} from "@playbench/shared";

import { CodeWriter, escapeTemplateLiteral, stringLiteral } from "./codegen.js";
import { ComponentIndex, findComponentProperty } from "./component-index.js";
import { hasInterpolation, splitInterpolation } from "./interpolation.js";
import { LineIndex } from "./line-index.js";
import { lowerMarkup, type MarkupAttribute, type MarkupElement, type MarkupNode } from "./markup.js";
import { componentNameFromPath, isValidIdentifier, toPascalCase } from "./naming.js";
import { scanTemplate } from "./scanner.js";
import { TemplateDiagCode, type ProjectItem, type TemplateDiagCodeType, type TemplateEngine, type TemplateOutput } from "./types.js";

export interface TemplateEngineOptions {
  /** Class every generated component extends. Defaults to `Component`. */
  baseClass?: string;
}

export function createTemplateEngine(options: TemplateEngineOptions = {}): TemplateEngine {
  return new DefaultTemplateEngine(options.baseClass ?? "Component");
}

class DefaultTemplateEngine implements TemplateEngine {
  constructor(private readonly baseClass: string) {}

  processDeclarationOnly(item: ProjectItem): TemplateOutput {
    return translate(item, this.baseClass, null);
  }

  process(item: ProjectItem, references: readonly LinkReference[]): TemplateOutput {
    return translate(item, this.baseClass, new ComponentIndex(references));
  }
}

const decoder = new TextDecoder();

class TranslationContext {
  readonly diagnostics: CompilationDiagnostic[] = [];
  readonly #lines: LineIndex;

  constructor(
    readonly fileName: string,
    text: string,
  ) {
    this.#lines = new LineIndex(text);
  }

  anchor(offset: number, generatedColumn = 0): SourceAnchor {
    return { ...this.#lines.position(offset), generatedColumn };
  }

  report(code: TemplateDiagCodeType, message: string, offset: number, severity: DiagnosticSeverity = "error"): void {
    const pos = this.#lines.position(offset);
    this.diagnostics.push(
      buildDiagnostic({
        code,
        message,
        severity,
        stage: "translate",
        location: { file: this.fileName, line: pos.line + 1, column: pos.column + 1 },
      }),
    );
  }
}

function translate(item: ProjectItem, baseClass: string, components: ComponentIndex | null): TemplateOutput {
  const text = decoder.decode(item.content);
  const ctx = new TranslationContext(item.fileName, text);

  const className = componentNameFromPath(item.filePath);
  if (!className) {
    ctx.report(
      TemplateDiagCode.INVALID_COMPONENT_NAME,
      `'${item.fileName}' does not produce a valid component class name.`,
      0,
    );
    return { generatedCode: "", diagnostics: ctx.diagnostics, lineMap: [] };
  }

  const structure = scanTemplate(text);
  for (const issue of structure.issues) ctx.report(issue.code, issue.message, issue.offset);

  const w = new CodeWriter();
  w.line(`// ${item.filePath}`);
  w.line(`class ${className} extends ${baseClass} {`, ctx.anchor(0));
  w.indent();

  for (const injection of structure.injections) {
    w.line(`readonly ${injection.memberName} = inject(${injection.typeName});`, ctx.anchor(injection.offset));
  }

  for (const block of structure.codeBlocks) {
    const start = ctx.anchor(block.bodyOffset);
    block.body.split("\n").forEach((line, i) => {
      w.raw(line, i === 0 ? start : { line: start.line + i, column: 0, generatedColumn: 0 });
    });
  }

  if (components) {
    const tree = lowerMarkup(structure.markup);
    for (const issue of tree.issues) ctx.report(issue.code, issue.message, issue.offset, "warning");

    w.line("");
    w.line("render(): Child[] {");
    w.indent();
    w.line("return [");
    w.indent();
    emitNodes(w, tree.nodes, ctx, components);
    w.dedent();
    w.line("];");
    w.dedent();
    w.line("}");
  }

  w.dedent();
  w.line("}");

  debug.translate(components ? "process" : "declaration", {
    file: item.filePath,
    className,
    codeBlocks: structure.codeBlocks.length,
    diagnostics: ctx.diagnostics.length,
  });

  return { generatedCode: w.toString(), diagnostics: ctx.diagnostics, lineMap: w.lineMap };
}

/* =============================================================================
 * RENDER EMISSION
 * ============================================================================= */

function isMeaningful(node: MarkupNode): boolean {
  return node.kind === "element" || node.value.trim().length > 0;
}

function emitNodes(w: CodeWriter, nodes: readonly MarkupNode[], ctx: TranslationContext, components: ComponentIndex): void {
  for (const node of nodes) {
    if (!isMeaningful(node)) continue;
    if (node.kind === "text") {
      emitText(w, node.value, node.offset, ctx);
    } else {
      emitElement(w, node, ctx, components);
    }
  }
}

function emitText(w: CodeWriter, value: string, offset: number, ctx: TranslationContext): void {
  const result = splitInterpolation(value);
  reportInterpolationIssues(result.unterminatedAt, result.empty, offset, ctx);

  for (const part of result.parts) {
    if (part.kind === "text") {
      const collapsed = part.text.replace(/\s+/g, " ");
      if (collapsed.length > 0) w.line(`${stringLiteral(collapsed)},`, ctx.anchor(offset));
    } else {
      w.line(`(${singleLine(part.code)}),`, ctx.anchor(offset + part.offset, 1));
    }
  }
}

function emitElement(w: CodeWriter, el: MarkupElement, ctx: TranslationContext, components: ComponentIndex): void {
  const component = components.lookup(el.tagName);
  if (!component && el.tagName.includes("-")) {
    ctx.report(
      TemplateDiagCode.UNKNOWN_ELEMENT,
      `Found markup element '<${el.tagName}>' with unexpected name. If this is intended to be a component, add a template for '${toPascalCase(el.tagName)}'.`,
      el.offset,
      "warning",
    );
  }

  const props = component ? componentProps(el, component, ctx) : elementProps(el, ctx);
  const target = component ? component.name : stringLiteral(el.tagName);
  const propsText = props.length > 0 ? `{ ${props.join(", ")} }` : "null";
  const children = el.children.filter(isMeaningful);

  if (children.length === 0) {
    w.line(`h(${target}, ${propsText}),`, ctx.anchor(el.offset));
    return;
  }
  w.line(`h(${target}, ${propsText}, [`, ctx.anchor(el.offset));
  w.indent();
  emitNodes(w, children, ctx, components);
  w.dedent();
  w.line("]),");
}

type BindingCommand = "bind" | "trigger";

function parseAttributeName(name: string): { target: string; command: BindingCommand | null } {
  const dot = name.lastIndexOf(".");
  if (dot > 0) {
    const suffix = name.slice(dot + 1);
    if (suffix === "bind" || suffix === "trigger") {
      return { target: name.slice(0, dot), command: suffix };
    }
  }
  return { target: name, command: null };
}

function elementProps(el: MarkupElement, ctx: TranslationContext): string[] {
  const props: string[] = [];
  for (const attr of el.attrs) {
    const { target, command } = parseAttributeName(attr.name);
    const key = command === "trigger" ? `on:${target}` : command === "bind" ? target : attr.name;
    const value = attributeValue(attr, command, ctx);
    if (value !== null) props.push(`${stringLiteral(key)}: ${value}`);
  }
  return props;
}

function componentProps(el: MarkupElement, component: ComponentDescriptor, ctx: TranslationContext): string[] {
  const props: string[] = [];
  for (const attr of el.attrs) {
    const { target, command } = parseAttributeName(attr.name);
    const property = findComponentProperty(component, target);
    if (!property) {
      ctx.report(
        TemplateDiagCode.UNKNOWN_COMPONENT_PROPERTY,
        `Component '${component.name}' does not have a property named '${target}'.`,
        attr.offset,
      );
      continue;
    }
    const value = attributeValue(attr, command, ctx);
    const key = isValidIdentifier(property.name) ? property.name : stringLiteral(property.name);
    if (value !== null) props.push(`${key}: ${value}`);
  }
  return props;
}

/** TypeScript for an attribute value; null when the binding is unusable (already reported). */
function attributeValue(attr: MarkupAttribute, command: BindingCommand | null, ctx: TranslationContext): string | null {
  if (command !== null) {
    if (attr.value.trim().length === 0) {
      ctx.report(TemplateDiagCode.EMPTY_INTERPOLATION, `The binding '${attr.name}' has no expression.`, attr.offset);
      return null;
    }
    const code = singleLine(attr.value);
    return command === "bind" ? `(${code})` : `($event: UiEvent) => { ${code}; }`;
  }

  if (!hasInterpolation(attr.value)) return stringLiteral(attr.value);

  const result = splitInterpolation(attr.value);
  reportInterpolationIssues(result.unterminatedAt, result.empty, attr.valueOffset, ctx);

  const [only] = result.parts;
  if (result.parts.length === 1 && only?.kind === "expr") return `(${singleLine(only.code)})`;

  const body = result.parts
    .map((part) => (part.kind === "text" ? escapeTemplateLiteral(part.text) : "${" + singleLine(part.code) + "}"))
    .join("");
  return "`" + body + "`";
}

function reportInterpolationIssues(
  unterminatedAt: number | undefined,
  empty: readonly number[],
  baseOffset: number,
  ctx: TranslationContext,
): void {
  if (unterminatedAt !== undefined) {
    ctx.report(
      TemplateDiagCode.UNTERMINATED_INTERPOLATION,
      "The interpolation is missing a closing '}' character.",
      baseOffset + unterminatedAt,
    );
  }
  for (const at of empty) {
    ctx.report(TemplateDiagCode.EMPTY_INTERPOLATION, "The interpolation has no expression.", baseOffset + at);
  }
}

function singleLine(code: string): string {
  return code.replace(/\r?\n/g, " ");
}
