/**
 * Copy of `value` without its undefined entries, so spreading it cannot mask
 * a value already set.
 */
export function definedEntries<T extends object>(value: T | undefined): Partial<T> {
    const result: Partial<T> = {};
    if (!value) return result;
    for (const key in value) {
        if (value[key] !== undefined) {
            result[key] = value[key];
        }
    }
    return result;
}
