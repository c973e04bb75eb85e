export class GrammarError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'GrammarError';
    }
}

export class ScanError extends GrammarError {
    constructor(message: string) {
        super(message);
        this.name = 'ScanError';
    }
}

export class MapperError extends GrammarError {
    constructor(message: string) {
        super(message);
        this.name = 'MapperError';
    }
}

export class ParseError extends GrammarError {
    constructor(
        public valueName: string,
        public cause: Error
    ) {
        super(`${valueName}: ${cause.message}`);
        this.name = 'ParseError';
    }
}
