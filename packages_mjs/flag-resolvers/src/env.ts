/**
 * Resolves flag values from environment variables.
 *
 * Positional arguments and catch-all arguments are never visited by the
 * per-flag resolution loop, so on its first call the resolver walks the
 * parsed command path once and assigns their environment values directly.
 */
import fs from 'fs';
import dotenv from 'dotenv';
import {
    Context, Flag, JsonValue, Path, Value, flagValueToken, scanFromTokens
} from '@flagwork/cli-grammar';
import { EnvAssignmentError, EnvFileError } from './errors.js';
import { logEnvFileLoaded, logResolverHit } from './logger.js';
import { Once } from './once.js';
import { BaseResolver } from './resolver.js';

export type EnvSource = Record<string, string | undefined>;

export type EnvLookup = (name: string) => string | undefined;

export interface EnvResolverOptions {
    /** Variables to read from; defaults to `process.env`, read at lookup time */
    env?: EnvSource;
    /** dotenv files consulted after `env`, in order */
    envFiles?: string[];
}

function loadEnvFiles(files: string[]): EnvSource {
    const merged: EnvSource = {};
    for (const file of files) {
        let parsed: Record<string, string>;
        try {
            parsed = dotenv.parse(fs.readFileSync(file));
        } catch (error) {
            throw new EnvFileError(file, error instanceof Error ? error : new Error(String(error)));
        }
        logEnvFileLoaded(file, Object.keys(parsed).length);
        for (const [key, value] of Object.entries(parsed)) {
            if (merged[key] === undefined) {
                merged[key] = value;
            }
        }
    }
    return merged;
}

export function createEnvLookup(options: EnvResolverOptions = {}): EnvLookup {
    const fromFiles = loadEnvFiles(options.envFiles ?? []);
    return (name: string) => {
        const live = (options.env ?? process.env)[name];
        return live !== undefined ? live : fromFiles[name];
    };
}

/**
 * Apply every set variable of `value.tag.envs` to the value's target, in order.
 */
export function assignValueFromEnv(value: Value, lookup: EnvLookup): void {
    for (const envVar of value.tag?.envs ?? []) {
        const raw = lookup(envVar);
        if (raw === undefined) {
            continue;
        }
        try {
            value.parse(scanFromTokens(flagValueToken(raw)), value.target);
        } catch (error) {
            throw new EnvAssignmentError(envVar, raw, error instanceof Error ? error : new Error(String(error)));
        }
        logResolverHit(value, { kind: 'env', envVar });
    }
}

/** True when the command line already supplied the value. */
export type SuppliedCheck = (value: Value) => boolean;

export function assignArgumentsFromEnv(
    paths: readonly Path[],
    lookup: EnvLookup,
    isSupplied: SuppliedCheck = () => false
): void {
    for (const segment of paths) {
        const command = segment.command;
        if (!command) {
            continue;
        }
        for (const positional of command.positional) {
            if (positional.tag === null || isSupplied(positional)) {
                continue;
            }
            assignValueFromEnv(positional, lookup);
        }
        if (command.argument && !isSupplied(command.argument)) {
            assignValueFromEnv(command.argument, lookup);
        }
    }
}

export class EnvResolver extends BaseResolver {
    private readonly argumentsAssigned = new Once();
    private readonly lookup: EnvLookup;

    constructor(options: EnvResolverOptions = {}) {
        super();
        this.lookup = createEnvLookup(options);
    }

    public resolve(context: Context, _parent: Path, flag: Flag): JsonValue | undefined {
        this.argumentsAssigned.do(() =>
            assignArgumentsFromEnv(context.path, this.lookup, value => context.isAssigned(value))
        );

        for (const envVar of flag.tag?.envs ?? []) {
            const raw = this.lookup(envVar);
            if (raw !== undefined) {
                logResolverHit(flag, { kind: 'env', envVar });
                return raw;
            }
        }
        return undefined;
    }
}

export function envResolver(options?: EnvResolverOptions): EnvResolver {
    return new EnvResolver(options);
}
