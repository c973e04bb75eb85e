/**
 * Diagnostics for resolver activity.
 *
 * Verbosity is read from FLAG_RESOLVERS_LOG_LEVEL on every event
 * (`silent`, `warn`, `debug` or `trace`; default `warn`).
 * Environment and document values are never printed, only where they came from.
 */
import type { Value } from '@flagwork/cli-grammar';
import type { DocumentFormat } from './errors.js';

const PREFIX = '[flag-resolvers]';

const VERBOSITY = { silent: 0, warn: 1, debug: 2, trace: 3 } as const;

type Verbosity = keyof typeof VERBOSITY;

function isVerbosity(value: string): value is Verbosity {
    return Object.prototype.hasOwnProperty.call(VERBOSITY, value);
}

export function currentVerbosity(): Verbosity {
    const configured = process.env.FLAG_RESOLVERS_LOG_LEVEL?.toLowerCase();
    return configured && isVerbosity(configured) ? configured : 'warn';
}

function enabled(level: Exclude<Verbosity, 'silent'>): boolean {
    return VERBOSITY[level] <= VERBOSITY[currentVerbosity()];
}

/** Where a resolved value came from, e.g. `document` or `env APP_PORT`. */
export type ResolutionSource = { kind: 'document' } | { kind: 'env'; envVar: string };

function describeSource(source: ResolutionSource): string {
    return source.kind === 'document' ? 'document' : `env ${source.envVar}`;
}

export function logDocumentDecoded(format: DocumentFormat, keys: string[]): void {
    if (enabled('debug')) {
        console.debug(`${PREFIX} decoded ${format} document (${keys.length} top-level key(s))`);
    }
    if (enabled('trace') && keys.length > 0) {
        console.log(`${PREFIX}   keys: ${keys.join(', ')}`);
    }
}

export function logEnvFileLoaded(file: string, count: number): void {
    if (enabled('debug')) {
        console.debug(`${PREFIX} loaded ${count} variable(s) from ${file}`);
    }
}

/** A flag, positional or argument received a value from `source`. */
export function logResolverHit(value: Value, source: ResolutionSource): void {
    if (enabled('trace')) {
        console.log(`${PREFIX} ${value.summary()} <- ${describeSource(source)}`);
    }
}

export function logUnknownKeys(keys: string[]): void {
    if (enabled('warn')) {
        console.warn(`${PREFIX} unknown configuration key(s): ${keys.join(', ')}`);
    }
}
