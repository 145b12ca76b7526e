import { createHash } from "node:crypto";

/**
 * Deterministic, stable JSON-like serialization for hashing.
 * - Sorts object keys; arrays keep their order.
 * - Treats `undefined` / functions as nullish literals to keep hashing total.
 * - Not resilient to cycles.
 */
export function stableSerialize(value: unknown): string {
  return serialize(value);
}

export function stableHash(value: unknown): string {
  return createHash("sha256").update(stableSerialize(value)).digest("hex");
}

function serialize(value: unknown): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "number":
      return Number.isFinite(value) ? String(value) : `"${String(value)}"`;
    case "boolean":
      return value ? "true" : "false";
    case "undefined":
      return "null";
    case "function":
      return '"<fn>"';
    case "object":
      if (value === null) return "null";
      if (Array.isArray(value)) return `[${value.map((v: unknown) => serialize(v)).join(",")}]`;
      return serializeObject(value);
    default:
      return JSON.stringify(String(value));
  }
}

function serializeObject(obj: object): string {
  const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const parts = entries.map(([k, v]) => `${JSON.stringify(k)}:${serialize(v)}`);
  return `{${parts.join(",")}}`;
}
