export class FlagResolverError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FlagResolverError';
    }
}

export type DocumentFormat = 'json' | 'yaml';

export class DocumentDecodeError extends FlagResolverError {
    constructor(
        public format: DocumentFormat,
        public cause: Error
    ) {
        super(`Failed to decode ${format} document: ${cause.message}`);
        this.name = 'DocumentDecodeError';
    }
}

export class DocumentValidationError extends FlagResolverError {
    constructor(public unknownKeys: string[]) {
        super(`Unknown configuration keys: ${unknownKeys.join(', ')}`);
        this.name = 'DocumentValidationError';
    }
}

export class EnvAssignmentError extends FlagResolverError {
    constructor(
        public envVar: string,
        public rawValue: string,
        public cause: Error
    ) {
        super(`${cause.message} (from envar ${envVar}=${JSON.stringify(rawValue)})`);
        this.name = 'EnvAssignmentError';
    }
}

export class EnvFileError extends FlagResolverError {
    constructor(
        public file: string,
        public cause: Error
    ) {
        super(`Failed to load env file '${file}': ${cause.message}`);
        this.name = 'EnvFileError';
    }
}
