/**
 * Freezes `value` and everything reachable from it in place. Already frozen
 * branches are skipped, so shared frozen subtrees are walked once.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return value;
  }
  for (const key of Reflect.ownKeys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  return Object.freeze(value);
}

/** Frozen structural copy; later changes to `data` are not visible through it. */
export function createSnapshot<T>(data: T): Readonly<T> {
  return deepFreeze(structuredClone(data));
}
