import { ScanError } from './errors.js';
import { EOL_TOKEN, Token, TokenType, isValueToken } from './tokens.js';

/**
 * Ordered stream of tokens consumed by value mappers.
 */
export class Scanner {
    private tokens: Token[];

    constructor(tokens: Token[] = []) {
        this.tokens = [...tokens];
    }

    public len(): number {
        return this.tokens.length;
    }

    public peek(): Token {
        return this.tokens[0] ?? EOL_TOKEN;
    }

    public pop(): Token {
        return this.tokens.shift() ?? EOL_TOKEN;
    }

    /**
     * Pop the next token, requiring it to carry a value.
     * @param what Description used in the error, e.g. "string"
     */
    public popValue(what: string): Token {
        const token = this.pop();
        if (!isValueToken(token)) {
            throw new ScanError(`expected ${what} value but got ${token.type === TokenType.EOL ? 'EOL' : `"${String(token.value)}"`}`);
        }
        return token;
    }

    public push(token: Token): this {
        this.tokens.push(token);
        return this;
    }
}

export function scanFromTokens(...tokens: Token[]): Scanner {
    return new Scanner(tokens);
}
