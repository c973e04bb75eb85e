import type { Context } from './context.js';
import { JsonValue } from './json.js';
import { Application, Flag, Path } from './model.js';

/**
 * A Resolver supplies a flag value from an external source when the
 * command line did not.
 */
export interface Resolver {
    /**
     * Check the resolver's source against the application grammar.
     * Throws when the source contains something the application cannot accept.
     */
    validate(app: Application): void;

    /**
     * Resolve the value for a flag.
     * @returns the raw value, or `undefined` when this resolver has none.
     * `null` is a present value.
     */
    resolve(context: Context, parent: Path, flag: Flag): JsonValue | undefined;
}
