/**
 * Freezes a value and every nested object or array it reaches.
 * Expects: value is acyclic; already frozen branches are skipped.
 */
export function freezeDeep<T>(value: T): T {
    if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
        return value;
    }
    Object.freeze(value);
    const children: unknown[] = Array.isArray(value) ? value : Object.values(value);
    for (const child of children) {
        freezeDeep(child);
    }
    return value;
}
