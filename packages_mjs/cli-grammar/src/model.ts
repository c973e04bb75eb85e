/**
 * Declared grammar: values, flags and the command tree they belong to.
 */
import { GrammarError, MapperError, ParseError, ScanError } from './errors.js';
import { Mapper } from './mappers.js';
import { Scanner, scanFromTokens } from './scanner.js';
import { flagValueToken } from './tokens.js';

export class Target<T> {
    private current: T | undefined = undefined;
    private assigned: boolean = false;

    public get value(): T | undefined {
        return this.current;
    }

    public get isSet(): boolean {
        return this.assigned;
    }

    public set(value: T): void {
        this.current = value;
        this.assigned = true;
    }
}

export interface Tag {
    /** Candidate environment variables, consulted in order */
    envs: string[];
    default?: string;
}

export interface ValueOptions<T> {
    name: string;
    mapper: Mapper<T>;
    help?: string;
    tag?: Tag | null;
    target?: Target<T>;
}

export class Value<T = unknown> {
    public readonly name: string;
    public readonly help: string;
    public readonly mapper: Mapper<T>;
    public readonly tag: Tag | null;
    public readonly target: Target<T>;

    constructor(options: ValueOptions<T>) {
        this.name = options.name;
        this.help = options.help ?? '';
        this.mapper = options.mapper;
        this.tag = options.tag ?? null;
        this.target = options.target ?? new Target<T>();
    }

    public summary(): string {
        return `<${this.name}>`;
    }

    /**
     * Decode the next token of `scan` and assign it to `target`.
     */
    public parse(scan: Scanner, target: Target<T> = this.target): void {
        let decoded: T;
        try {
            decoded = this.mapper.decode(scan);
        } catch (error) {
            if (error instanceof MapperError || error instanceof ScanError) {
                throw new ParseError(this.summary(), error);
            }
            throw error;
        }
        target.set(decoded);
    }

    public applyDefault(): boolean {
        const fallback = this.tag?.default;
        if (this.target.isSet || fallback === undefined) {
            return false;
        }
        this.parse(scanFromTokens(flagValueToken(fallback)));
        return true;
    }
}

export interface FlagOptions<T> extends ValueOptions<T> {
    short?: string;
}

export class Flag<T = unknown> extends Value<T> {
    public readonly short: string | null;

    constructor(options: FlagOptions<T>) {
        super(options);
        this.short = options.short ?? null;
    }

    public summary(): string {
        return `--${this.name}`;
    }
}

export interface CommandOptions {
    name: string;
    help?: string;
    flags?: Flag[];
    positional?: Value[];
    argument?: Value | null;
}

export class Command {
    public readonly name: string;
    public readonly help: string;
    public readonly flags: Flag[];
    public readonly positional: Value[];
    public readonly argument: Value | null;
    public readonly children: Command[] = [];

    constructor(options: CommandOptions) {
        this.name = options.name;
        this.help = options.help ?? '';
        this.flags = options.flags ?? [];
        this.positional = options.positional ?? [];
        this.argument = options.argument ?? null;
    }

    public addChild(child: Command): this {
        if (this.children.some(existing => existing.name === child.name)) {
            throw new GrammarError(`duplicate command '${child.name}' under '${this.name}'`);
        }
        this.children.push(child);
        return this;
    }

    public child(name: string): Command | undefined {
        return this.children.find(child => child.name === name);
    }
}

export class Application extends Command {
    /** Every flag in the command tree, depth-first in declaration order. */
    public allFlags(): Flag[] {
        const flags: Flag[] = [];
        const visit = (command: Command): void => {
            flags.push(...command.flags);
            command.children.forEach(visit);
        };
        visit(this);
        return flags;
    }
}

/**
 * One segment of a parsed invocation.
 */
export interface Path {
    parent: Command | null;
    command: Command | null;
    flag: Flag | null;
    positional: Value | null;
    /** Flags declared at this segment */
    flags: Flag[];
    /** True when the segment was added by a resolver rather than the command line */
    resolved: boolean;
}

export function commandPath(command: Command, parent: Command | null = null): Path {
    return {
        parent,
        command,
        flag: null,
        positional: null,
        flags: command.flags,
        resolved: false
    };
}

export function resolvedFlagPath(flag: Flag, parent: Command | null): Path {
    return {
        parent,
        command: null,
        flag,
        positional: null,
        flags: [],
        resolved: true
    };
}
