import { JsonValue } from './json.js';

export enum TokenType {
    UNTYPED = 'untyped',
    EOL = 'eol',
    FLAG = 'flag',
    SHORT_FLAG = 'short-flag',
    /** A literal value for the preceding flag */
    FLAG_VALUE = 'flag-value',
    POSITIONAL_ARG = 'positional-arg'
}

export interface Token {
    type: TokenType;
    value: JsonValue;
}

export const EOL_TOKEN: Token = { type: TokenType.EOL, value: null };

export function flagValueToken(value: JsonValue): Token {
    return { type: TokenType.FLAG_VALUE, value };
}

export function isValueToken(token: Token): boolean {
    return token.type === TokenType.FLAG_VALUE
        || token.type === TokenType.POSITIONAL_ARG
        || token.type === TokenType.UNTYPED;
}
