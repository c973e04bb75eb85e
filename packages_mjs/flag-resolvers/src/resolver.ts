import type { Application, Context, Flag, JsonValue, Path, Resolver } from '@flagwork/cli-grammar';

export type ResolveFn = (context: Context, parent: Path, flag: Flag) => JsonValue | undefined;

/**
 * Base for resolvers with no structural validation.
 */
export abstract class BaseResolver implements Resolver {
    public validate(_app: Application): void {
        return;
    }

    public abstract resolve(context: Context, parent: Path, flag: Flag): JsonValue | undefined;
}

/**
 * Adapts a plain function into a non-validating Resolver.
 */
export class FuncResolver extends BaseResolver {
    constructor(private readonly fn: ResolveFn) {
        super();
    }

    public resolve(context: Context, parent: Path, flag: Flag): JsonValue | undefined {
        return this.fn(context, parent, flag);
    }
}

export function resolverFunc(fn: ResolveFn): Resolver {
    return new FuncResolver(fn);
}
