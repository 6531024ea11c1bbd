/**
 * Narrowing helpers for decoded JSON of unknown shape.
 */

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** A string field, or undefined when absent or not a string. */
export function stringField(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

/** Follow a key path through nested objects; undefined if any hop is missing. */
export function getPath(obj: JsonObject, path: readonly string[]): unknown {
  let current: unknown = obj;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/** An array at a key path, or an empty array. */
export function arrayAt(obj: JsonObject, path: readonly string[]): unknown[] {
  const value = getPath(obj, path);
  return Array.isArray(value) ? value : [];
}
