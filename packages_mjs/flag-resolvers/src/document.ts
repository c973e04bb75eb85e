/**
 * Resolves flag values from a decoded configuration document.
 *
 * A flag named `db-host` is looked up as `db_host`, then `dbHost`, then as
 * the nested path `db.host`.
 */
import fs from 'fs';
import path from 'path';
import {
    Application, Context, Flag, JsonMapping, JsonValue, Path, hasOwnKey, isJsonMapping
} from '@flagwork/cli-grammar';
import { DocumentSource, decodeDocument } from './decode.js';
import { DocumentDecodeError, DocumentFormat, DocumentValidationError } from './errors.js';
import { logResolverHit, logUnknownKeys } from './logger.js';
import { lookupKeys, underscoreName } from './names.js';
import { BaseResolver } from './resolver.js';

const YAML_EXTENSIONS = ['.yaml', '.yml'];

export interface DocumentResolverOptions {
    /** Reject top-level keys that no flag of the application claims */
    strict?: boolean;
}

export interface DocumentStreamOptions extends DocumentResolverOptions {
    format?: DocumentFormat;
}

function walkPath(document: JsonMapping, segments: string[]): JsonValue | undefined {
    let current: JsonValue = document;
    for (const segment of segments) {
        if (!isJsonMapping(current) || !hasOwnKey(current, segment)) {
            return undefined;
        }
        current = current[segment];
    }
    return current;
}

function dottedSegments(name: string): string[] {
    return underscoreName(name).split('.');
}

function sectionSegments(name: string): string[] {
    return name.split(/[.-]/);
}

/**
 * Look up the value for flag `name`. Top-level keys win over nested paths.
 */
export function lookupFlagValue(document: JsonMapping, name: string): JsonValue | undefined {
    for (const key of lookupKeys(name)) {
        if (hasOwnKey(document, key)) {
            return document[key];
        }
    }

    const nested = walkPath(document, dottedSegments(name));
    if (nested !== undefined || !name.includes('-')) {
        return nested;
    }
    return walkPath(document, sectionSegments(name));
}

/** Top-level keys through which a flag can be resolved. */
export function claimedKeys(name: string): string[] {
    return [...lookupKeys(name), dottedSegments(name)[0], sectionSegments(name)[0]];
}

export class DocumentResolver extends BaseResolver {
    constructor(
        private readonly document: JsonMapping,
        private readonly options: DocumentResolverOptions = {}
    ) {
        super();
    }

    public keys(): string[] {
        return Object.keys(this.document);
    }

    public validate(app: Application): void {
        if (!this.options.strict) {
            return;
        }
        const claimed = new Set(app.allFlags().flatMap(flag => claimedKeys(flag.name)));
        const unknownKeys = this.keys().filter(key => !claimed.has(key));
        if (unknownKeys.length > 0) {
            logUnknownKeys(unknownKeys);
            throw new DocumentValidationError(unknownKeys);
        }
    }

    public resolve(_context: Context, _parent: Path, flag: Flag): JsonValue | undefined {
        const value = lookupFlagValue(this.document, flag.name);
        if (value !== undefined) {
            logResolverHit(flag, { kind: 'document' });
        }
        return value;
    }
}

export function jsonResolver(source: DocumentSource, options?: DocumentResolverOptions): DocumentResolver {
    return new DocumentResolver(decodeDocument(source, 'json'), options);
}

export function yamlResolver(source: DocumentSource, options?: DocumentResolverOptions): DocumentResolver {
    return new DocumentResolver(decodeDocument(source, 'yaml'), options);
}

export function formatForFile(filePath: string): DocumentFormat {
    return YAML_EXTENSIONS.includes(path.extname(filePath).toLowerCase()) ? 'yaml' : 'json';
}

/**
 * Read and decode a configuration file; `.yaml`/`.yml` files are YAML, anything else JSON.
 */
export function documentResolverFromFile(filePath: string, options?: DocumentResolverOptions): DocumentResolver {
    const format = formatForFile(filePath);
    let content: Buffer;
    try {
        content = fs.readFileSync(filePath);
    } catch (error) {
        throw new DocumentDecodeError(format, error instanceof Error ? error : new Error(String(error)));
    }
    return new DocumentResolver(decodeDocument(content, format), options);
}

export async function documentResolverFromStream(
    stream: NodeJS.ReadableStream,
    options: DocumentStreamOptions = {}
): Promise<DocumentResolver> {
    const { format = 'json', ...resolverOptions } = options;
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
    }
    return new DocumentResolver(decodeDocument(Buffer.concat(chunks), format), resolverOptions);
}
