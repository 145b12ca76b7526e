import { describe, it, expect } from "vitest";
import type { LinkReference } from "@playbench/shared";

import { createProjectItem, createTemplateEngine } from "@playbench/template";

const framework: LinkReference = {
  name: "framework",
  components: [
    {
      name: "DialogProvider",
      tagName: "dialog-provider",
      file: "/framework/playbench.d.ts",
      origin: "framework",
      properties: [
        { name: "fullWidth", type: "boolean" },
        { name: "maxWidth", type: '"extra-small" | "small" | "medium" | "large"' },
      ],
    },
  ],
};

const project: LinkReference = {
  name: "project",
  components: [
    {
      name: "UserCard",
      tagName: "user-card",
      file: "UserCard.view",
      origin: "project",
      properties: [
        { name: "name", type: "string" },
        { name: "age", type: "number" },
      ],
    },
  ],
};

const lines = (...text: string[]): string => text.join("\n") + "\n";

describe("processDeclarationOnly", () => {
  const engine = createTemplateEngine();

  it("emits the class shape without a render method", () => {
    const item = createProjectItem("Counter.view", "<p>${this.count}</p>\n@code {\n  count = 0;\n}\n");
    const output = engine.processDeclarationOnly(item);

    expect(output.diagnostics).toEqual([]);
    expect(output.generatedCode).toBe(
      lines("// /Counter.view", "class Counter extends Component {", "", "  count = 0;", "", "}"),
    );
  });

  it("anchors code block lines to their template lines", () => {
    const item = createProjectItem("Counter.view", "<p>${this.count}</p>\n@code {\n  count = 0;\n}\n");
    const output = engine.processDeclarationOnly(item);

    expect(output.lineMap[1]).toEqual({ line: 0, column: 0, generatedColumn: 0 });
    expect(output.lineMap[2]).toEqual({ line: 1, column: 7, generatedColumn: 0 });
    expect(output.lineMap[3]).toEqual({ line: 2, column: 0, generatedColumn: 0 });
  });

  it("emits injected members", () => {
    const item = createProjectItem("Notes.view", "@inject DialogService dialogs\n<p></p>");
    const output = engine.processDeclarationOnly(item);
    expect(output.generatedCode).toContain("\n  readonly dialogs = inject(DialogService);\n");
  });

  it("does not interpret markup", () => {
    const item = createProjectItem("Broken.view", "<p>${oops</p>");
    expect(engine.processDeclarationOnly(item).diagnostics).toEqual([]);
  });

  it("reports an unterminated code block with its location", () => {
    const item = createProjectItem("Broken.view", "<p></p>\n@code {\n  x = 1;\n");
    expect(engine.processDeclarationOnly(item).diagnostics).toEqual([
      {
        code: "TPL0001",
        message: "The @code block is missing a closing '}' character.",
        severity: "error",
        stage: "translate",
        location: { file: "Broken.view", line: 2, column: 1 },
      },
    ]);
  });

  it("rejects file names that do not make a class name", () => {
    const output = engine.processDeclarationOnly(createProjectItem("3d.view", "<p></p>"));
    expect(output.generatedCode).toBe("");
    expect(output.diagnostics).toEqual([
      {
        code: "TPL0004",
        message: "'3d.view' does not produce a valid component class name.",
        severity: "error",
        stage: "translate",
        location: { file: "3d.view", line: 1, column: 1 },
      },
    ]);
  });

  it("honors a custom base class", () => {
    const custom = createTemplateEngine({ baseClass: "LayoutComponent" });
    const output = custom.processDeclarationOnly(createProjectItem("Shell.view", "<p></p>"));
    expect(output.generatedCode).toContain("class Shell extends LayoutComponent {");
  });
});

describe("process", () => {
  const engine = createTemplateEngine();

  it("emits a render method and resolves components across references", () => {
    const item = createProjectItem(
      "Greeting.view",
      '<user-card name="Ada" age.bind="36"></user-card>\n<p>Hi ${this.who}</p>\n@code {\n  who = "you";\n}\n',
    );
    const output = engine.process(item, [framework, project]);

    expect(output.diagnostics).toEqual([]);
    expect(output.generatedCode).toBe(
      lines(
        "// /Greeting.view",
        "class Greeting extends Component {",
        "",
        '  who = "you";',
        "",
        "",
        "  render(): Child[] {",
        "    return [",
        '      h(UserCard, { name: "Ada", age: (36) }),',
        '      h("p", null, [',
        '        "Hi ",',
        "        (this.who),",
        "      ]),",
        "    ];",
        "  }",
        "}",
      ),
    );
  });

  it("matches components by lower-cased class name", () => {
    const item = createProjectItem("Page.view", '<UserCard name="x"></UserCard>');
    const output = engine.process(item, [project]);
    expect(output.generatedCode).toContain('      h(UserCard, { name: "x" }),\n');
  });

  it("maps kebab-case attributes onto component properties", () => {
    const item = createProjectItem("Page.view", '<dialog-provider full-width.bind="true" max-width="small"></dialog-provider>');
    const output = engine.process(item, [framework]);
    expect(output.generatedCode).toContain('h(DialogProvider, { fullWidth: (true), maxWidth: "small" }),');
  });

  it("warns about unknown hyphenated elements", () => {
    const output = engine.process(createProjectItem("Page.view", "<fancy-box></fancy-box>"), [framework]);

    expect(output.generatedCode).toContain('      h("fancy-box", null),\n');
    expect(output.diagnostics).toEqual([
      {
        code: "TPL1001",
        message:
          "Found markup element '<fancy-box>' with unexpected name. If this is intended to be a component, add a template for 'FancyBox'.",
        severity: "warning",
        stage: "translate",
        location: { file: "Page.view", line: 1, column: 1 },
      },
    ]);
  });

  it("reports unknown component properties", () => {
    const output = engine.process(createProjectItem("Page.view", '<user-card nickname="x"></user-card>'), [project]);

    expect(output.generatedCode).toContain("      h(UserCard, null),\n");
    expect(output.diagnostics).toEqual([
      {
        code: "TPL1002",
        message: "Component 'UserCard' does not have a property named 'nickname'.",
        severity: "error",
        stage: "translate",
        location: { file: "Page.view", line: 1, column: 12 },
      },
    ]);
  });

  it("reports unterminated interpolations", () => {
    const output = engine.process(createProjectItem("Broken.view", "<p>${oops</p>"), []);
    expect(output.diagnostics.map((d) => [d.code, d.location?.line, d.location?.column])).toEqual([["TPL0003", 1, 4]]);
  });

  it("emits event handlers for trigger bindings", () => {
    const output = engine.process(createProjectItem("Page.view", '<button click.trigger="this.n++">Add</button>'), []);
    expect(output.generatedCode).toContain(
      lines(
        '      h("button", { "on:click": ($event: UiEvent) => { this.n++; } }, [',
        '        "Add",',
        "      ]),",
      ),
    );
  });

  it("emits template literals for interpolated attributes", () => {
    const output = engine.process(createProjectItem("Page.view", '<a href="/users/${this.id}/edit"></a>'), []);
    expect(output.generatedCode).toContain('h("a", { "href": `/users/${this.id}/edit` }),');
  });

  it("reports an empty binding", () => {
    const output = engine.process(createProjectItem("Page.view", '<input value.bind="">'), []);
    expect(output.diagnostics.map((d) => d.code)).toEqual(["TPL0005"]);
    expect(output.generatedCode).toContain('      h("input", null),\n');
  });

  it("reports HTML parse errors as warnings", () => {
    const output = engine.process(createProjectItem("Page.view", '<div class="a"'), []);
    expect(output.diagnostics.some((d) => d.code === "TPL0100" && d.severity === "warning")).toBe(true);
  });
});
