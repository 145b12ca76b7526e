import type { ComponentDescriptor, ComponentProperty, LinkReference } from "@playbench/shared";

/**
 * Tag lookup over every component visible through a set of link references.
 * An element matches by kebab-case tag or by lower-cased class name (the HTML parser
 * lower-cases `<UserCard>` to `usercard`). Later references shadow earlier ones.
 */
export class ComponentIndex {
  readonly #byKey = new Map<string, ComponentDescriptor>();

  constructor(references: readonly LinkReference[]) {
    for (const reference of references) {
      for (const component of reference.components) {
        this.#byKey.set(component.tagName, component);
        this.#byKey.set(component.name.toLowerCase(), component);
      }
    }
  }

  lookup(tagName: string): ComponentDescriptor | undefined {
    return this.#byKey.get(tagName.toLowerCase());
  }
}

function normalizePropertyName(name: string): string {
  return name.toLowerCase().replace(/-/g, "");
}

/** `max-width` and `maxwidth` both find `maxWidth`. */
export function findComponentProperty(
  component: ComponentDescriptor,
  attributeName: string,
): ComponentProperty | undefined {
  const wanted = normalizePropertyName(attributeName);
  return component.properties.find((p) => normalizePropertyName(p.name) === wanted);
}
