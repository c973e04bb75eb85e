/**
 * Basic usage examples for flag-resolvers package.
 *
 * Resolvers fill flags the command line left out, in registration order.
 */
import { Application, Command, Context, Flag, Value, intMapper, stringMapper } from "@flagwork/cli-grammar";
import { envResolver, jsonResolver, resolverFunc } from "@flagwork/flag-resolvers";

function buildApp(): { app: Application; port: Flag<number>; host: Flag<string>; target: Value<string> } {
    const port = new Flag({ name: "server-port", mapper: intMapper, tag: { envs: ["APP_PORT"], default: "80" } });
    const host = new Flag({ name: "server-host", mapper: stringMapper, tag: { envs: ["APP_HOST"] } });
    const target = new Value({ name: "target", mapper: stringMapper, tag: { envs: ["APP_TARGET"] } });
    const app = new Application({ name: "deployer" });
    app.addChild(new Command({ name: "deploy", flags: [port, host], positional: [target] }));
    return { app, port, host, target };
}

// =============================================================================
// Example 1: Nested config document
// =============================================================================
/**
 * `server-port` is looked up as `server_port`, `serverPort`, then `server.port`.
 */
function example1_document(): void {
    const { app, port } = buildApp();
    const context = Context.forCommands(app, "deploy");

    context.resolve([jsonResolver('{"server": {"port": 8443}}')]);
    console.log("Example 1 - Document:", port.target.value);
    // Output: 8443
}

// =============================================================================
// Example 2: Environment variables, including positionals
// =============================================================================
function example2_environment(): void {
    process.env.APP_HOST = "deploy.internal";
    process.env.APP_TARGET = "production";

    const { app, host, target } = buildApp();
    const context = Context.forCommands(app, "deploy");

    context.resolve([envResolver()]);
    console.log("Example 2 - Env:", host.target.value, target.target.value);
    // Output: "deploy.internal" "production"

    delete process.env.APP_HOST;
    delete process.env.APP_TARGET;
}

// =============================================================================
// Example 3: Custom resolver from a function
// =============================================================================
function example3_custom(): void {
    const { app, port } = buildApp();
    const context = Context.forCommands(app, "deploy");
    const overrides: Record<string, number> = { "server-port": 9000 };

    context.resolve([resolverFunc((_context, _parent, flag) => overrides[flag.name])]);
    context.applyDefaults();
    console.log("Example 3 - Custom:", port.target.value);
    // Output: 9000
}

example1_document();
example2_environment();
example3_custom();
