import { MapperError } from './errors.js';
import { JsonValue } from './json.js';
import { Scanner } from './scanner.js';

/**
 * Decodes the next value token of a scanner into a typed value.
 */
export interface Mapper<T> {
    readonly kind: string;
    decode(scan: Scanner): T;
}

const INT_PATTERN = /^[-+]?\d+$/;
const TRUE_WORDS = ['true', '1', 'yes', 'on'];
const FALSE_WORDS = ['false', '0', 'no', 'off'];

function describe(value: JsonValue): string {
    return JSON.stringify(value);
}

export const stringMapper: Mapper<string> = {
    kind: 'string',
    decode(scan: Scanner): string {
        const { value } = scan.popValue('string');
        if (typeof value === 'string') return value;
        if (typeof value === 'number' || typeof value === 'boolean') return String(value);
        throw new MapperError(`expected a string but got ${describe(value)}`);
    }
};

export const intMapper: Mapper<number> = {
    kind: 'int',
    decode(scan: Scanner): number {
        const { value } = scan.popValue('int');
        if (typeof value === 'number' && Number.isInteger(value)) return value;
        if (typeof value === 'string' && INT_PATTERN.test(value)) return Number.parseInt(value, 10);
        throw new MapperError(`expected an int but got ${describe(value)}`);
    }
};

export const floatMapper: Mapper<number> = {
    kind: 'float',
    decode(scan: Scanner): number {
        const { value } = scan.popValue('float');
        if (typeof value === 'number' && Number.isFinite(value)) return value;
        if (typeof value === 'string' && value.trim() !== '') {
            const parsed = Number(value);
            if (Number.isFinite(parsed)) return parsed;
        }
        throw new MapperError(`expected a float but got ${describe(value)}`);
    }
};

export const boolMapper: Mapper<boolean> = {
    kind: 'bool',
    decode(scan: Scanner): boolean {
        const { value } = scan.popValue('bool');
        if (typeof value === 'boolean') return value;
        if (typeof value === 'string') {
            const word = value.toLowerCase();
            if (TRUE_WORDS.includes(word)) return true;
            if (FALSE_WORDS.includes(word)) return false;
        }
        throw new MapperError(`expected a bool but got ${describe(value)}`);
    }
};

export function stringListMapper(sep: string = ','): Mapper<string[]> {
    return {
        kind: 'strings',
        decode(scan: Scanner): string[] {
            const { value } = scan.popValue('list');
            if (typeof value === 'string') {
                return value === '' ? [] : value.split(sep);
            }
            if (Array.isArray(value)) {
                return value.map(item => {
                    if (typeof item === 'string') return item;
                    if (typeof item === 'number' || typeof item === 'boolean') return String(item);
                    throw new MapperError(`expected a list of strings but got element ${describe(item)}`);
                });
            }
            throw new MapperError(`expected a list but got ${describe(value)}`);
        }
    };
}
