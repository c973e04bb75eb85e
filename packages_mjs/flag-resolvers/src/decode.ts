/**
 * Decoding of structured configuration sources into a read-only document.
 */
import yaml from 'js-yaml';
import { JsonMapping, JsonValue, isJsonMapping } from '@flagwork/cli-grammar';
import { DocumentDecodeError, DocumentFormat } from './errors.js';
import { logDocumentDecoded } from './logger.js';
import { DocumentSchema } from './schema.js';

export type DocumentSource = string | Uint8Array;

export function sourceText(source: DocumentSource): string {
    return typeof source === 'string' ? source : Buffer.from(source).toString('utf-8');
}

function deepFreeze(value: JsonValue): void {
    if (Array.isArray(value)) {
        value.forEach(deepFreeze);
    } else if (isJsonMapping(value)) {
        Object.values(value).forEach(deepFreeze);
    } else {
        return;
    }
    Object.freeze(value);
}

function parseText(text: string, format: DocumentFormat): unknown {
    try {
        if (format === 'yaml') {
            return yaml.load(text, { schema: yaml.JSON_SCHEMA });
        }
        return JSON.parse(text);
    } catch (error) {
        throw new DocumentDecodeError(format, error instanceof Error ? error : new Error(String(error)));
    }
}

/**
 * Decode `source` fully. A `null` or empty document decodes to an empty mapping;
 * any other non-mapping top level is rejected.
 */
export function decodeDocument(source: DocumentSource, format: DocumentFormat): JsonMapping {
    const raw = parseText(sourceText(source), format);
    if (raw === null || raw === undefined) {
        logDocumentDecoded(format, []);
        return {};
    }

    const result = DocumentSchema.safeParse(raw);
    if (!result.success) {
        const errorMsg = result.error.errors
            .map(e => `${e.path.length > 0 ? e.path.join('.') : '<root>'}: ${e.message}`)
            .join(', ');
        throw new DocumentDecodeError(format, new Error(errorMsg));
    }

    logDocumentDecoded(format, Object.keys(result.data));
    deepFreeze(result.data);
    return result.data;
}
