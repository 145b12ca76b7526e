const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

/** "user-card" → "UserCard", "counter" → "Counter" */
export function toPascalCase(name: string): string {
  return name
    .split(/[-_\s]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

/** "UserCard" → "user-card", "HTMLView" → "html-view" */
export function toKebabCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1-$2")
    .replace(/([A-Z])([A-Z][a-z])/g, "$1-$2")
    .toLowerCase();
}

/**
 * Component class name for a template path: the base name up to its first dot, in
 * PascalCase. Returns null when that is not a usable identifier.
 */
export function componentNameFromPath(filePath: string): string | null {
  const base = filePath.slice(filePath.lastIndexOf("/") + 1);
  const dot = base.indexOf(".");
  const stem = dot >= 0 ? base.slice(0, dot) : base;
  const name = toPascalCase(stem);
  return isValidIdentifier(name) ? name : null;
}
