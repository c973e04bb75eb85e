export type JsonValue = string | number | boolean | null | JsonValue[] | JsonMapping;

export interface JsonMapping {
    [key: string]: JsonValue;
}

export function isJsonMapping(value: JsonValue | undefined): value is JsonMapping {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function hasOwnKey(mapping: JsonMapping, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(mapping, key);
}
