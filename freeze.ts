/**
 * Freezes a catalog value and everything reachable from it. Catalog
 * objects are handed to callers as-is, so no nested example, enum or
 * parameter list may stay writable.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const key of Reflect.ownKeys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
    Object.freeze(value);
  }
  return value;
}
