/**
 * Lookup-key variants of a hyphenated flag name.
 */

/**
 * @example underscoreName('my-flag') => 'my_flag'
 */
export function underscoreName(name: string): string {
    return name.replace(/-/g, '_');
}

/**
 * @example camelCaseName('my-flag') => 'myFlag'
 * @example camelCaseName('a-b-c') => 'aBC'
 */
export function camelCaseName(name: string): string {
    const joined = name
        .split('-')
        .map(word => word.charAt(0).toUpperCase() + word.slice(1))
        .join('');
    return joined.charAt(0).toLowerCase() + joined.slice(1);
}

/** Keys tried at the top level of a document, underscore form first. */
export function lookupKeys(name: string): [string, string] {
    return [underscoreName(name), camelCaseName(name)];
}
