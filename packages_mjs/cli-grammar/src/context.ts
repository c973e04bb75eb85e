import { GrammarError } from './errors.js';
import { JsonValue } from './json.js';
import { Application, Command, Flag, Path, Value, commandPath, resolvedFlagPath } from './model.js';
import type { Resolver } from './resolver.js';
import { scanFromTokens } from './scanner.js';
import { flagValueToken } from './tokens.js';

/**
 * A parsed invocation: the path from the application root to the matched
 * leaf command, plus the values supplied on the command line.
 */
export class Context {
    public readonly app: Application;
    public readonly path: Path[];
    private readonly assigned: Set<Value> = new Set();

    constructor(app: Application, path: Path[] = [commandPath(app)]) {
        this.app = app;
        this.path = path;
    }

    /**
     * Build a context by walking child commands by name from the root.
     * @example Context.forCommands(app, 'remote', 'add')
     */
    public static forCommands(app: Application, ...names: string[]): Context {
        const path: Path[] = [commandPath(app)];
        let current: Command = app;
        for (const name of names) {
            const next = current.child(name);
            if (!next) {
                throw new GrammarError(`unknown command '${name}' under '${current.name}'`);
            }
            path.push(commandPath(next, current));
            current = next;
        }
        return new Context(app, path);
    }

    /** Assign a command-line value to a flag, positional or argument. */
    public assign(value: Value, raw: JsonValue): void {
        value.parse(scanFromTokens(flagValueToken(raw)));
        this.assigned.add(value);
    }

    public isAssigned(value: Value): boolean {
        return this.assigned.has(value);
    }

    public flags(): Flag[] {
        return this.path.flatMap(segment => segment.flags);
    }

    /**
     * Fill flags missing from the command line using `resolvers`, in
     * registration order. The first resolver to produce a value for a flag wins.
     * @returns the flags that received a resolved value
     */
    public resolve(resolvers: readonly Resolver[]): Flag[] {
        for (const resolver of resolvers) {
            resolver.validate(this.app);
        }

        const inserted: Path[] = [];
        const segments = [...this.path];
        for (const resolver of resolvers) {
            for (const segment of segments) {
                for (const flag of segment.flags) {
                    if (this.assigned.has(flag)) continue;

                    const raw = resolver.resolve(this, segment, flag);
                    if (raw === undefined) continue;

                    flag.parse(scanFromTokens(flagValueToken(raw)));
                    this.assigned.add(flag);
                    inserted.push(resolvedFlagPath(flag, segment.command));
                }
            }
        }

        this.path.push(...inserted);
        return inserted.flatMap(segment => (segment.flag ? [segment.flag] : []));
    }

    /** Apply declared defaults to every value along the path left unset. */
    public applyDefaults(): void {
        for (const segment of this.path) {
            for (const flag of segment.flags) {
                flag.applyDefault();
            }
            if (!segment.command) continue;
            for (const positional of segment.command.positional) {
                positional.applyDefault();
            }
            segment.command.argument?.applyDefault();
        }
    }
}
