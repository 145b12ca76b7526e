/* =============================================================================
 * INPUTS
 * ============================================================================= */

export type CodeFileType = "template" | "source";

/** One user-authored file. Identity is `path`. */
export interface CodeFile {
  readonly path: string;
  readonly content: string;
  readonly type: CodeFileType;
}

/* =============================================================================
 * LINK REFERENCES
 * ============================================================================= */

export interface ComponentProperty {
  name: string;
  /** Type as printed by the checker, e.g. `string | undefined` */
  type: string;
}

export type ComponentOrigin = "framework" | "project";

/** A component class visible to template lookups. */
export interface ComponentDescriptor {
  /** Class name, e.g. `UserCard` */
  name: string;
  /** Kebab-case tag, e.g. `user-card` */
  tagName: string;
  /** File that declared the class (original path for project components) */
  file: string;
  origin: ComponentOrigin;
  properties: readonly ComponentProperty[];
}

/**
 * Metadata-only view of a link unit. Never carries emitted code; templates only use it
 * to resolve component tags against classes declared elsewhere.
 */
export interface LinkReference {
  name: string;
  components: readonly ComponentDescriptor[];
}
