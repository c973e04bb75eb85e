import { Flag, stringMapper } from '@flagwork/cli-grammar';
import {
    currentVerbosity, logDocumentDecoded, logEnvFileLoaded, logResolverHit, logUnknownKeys
} from '../src/logger.js';

describe('Resolver diagnostics', () => {
    const originalLevel = process.env.FLAG_RESOLVERS_LOG_LEVEL;
    const flag = new Flag({ name: 'server-port', mapper: stringMapper });

    afterEach(() => {
        jest.restoreAllMocks();
        if (originalLevel === undefined) {
            delete process.env.FLAG_RESOLVERS_LOG_LEVEL;
        } else {
            process.env.FLAG_RESOLVERS_LOG_LEVEL = originalLevel;
        }
    });

    it('defaults to warn and ignores unknown levels', () => {
        delete process.env.FLAG_RESOLVERS_LOG_LEVEL;
        expect(currentVerbosity()).toBe('warn');
        process.env.FLAG_RESOLVERS_LOG_LEVEL = 'loud';
        expect(currentVerbosity()).toBe('warn');
        process.env.FLAG_RESOLVERS_LOG_LEVEL = 'TRACE';
        expect(currentVerbosity()).toBe('trace');
    });

    it('reports resolver hits with their source at trace', () => {
        process.env.FLAG_RESOLVERS_LOG_LEVEL = 'trace';
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

        logResolverHit(flag, { kind: 'env', envVar: 'APP_PORT' });
        logResolverHit(flag, { kind: 'document' });

        expect(log.mock.calls).toEqual([
            ['[flag-resolvers] --server-port <- env APP_PORT'],
            ['[flag-resolvers] --server-port <- document']
        ]);
    });

    it('keeps resolver hits quiet below trace', () => {
        process.env.FLAG_RESOLVERS_LOG_LEVEL = 'debug';
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

        logResolverHit(flag, { kind: 'document' });

        expect(log).not.toHaveBeenCalled();
    });

    it('reports decoded documents and env files at debug', () => {
        process.env.FLAG_RESOLVERS_LOG_LEVEL = 'debug';
        const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);

        logDocumentDecoded('yaml', ['server', 'tags']);
        logEnvFileLoaded('app.env', 2);

        expect(debug.mock.calls).toEqual([
            ['[flag-resolvers] decoded yaml document (2 top-level key(s))'],
            ['[flag-resolvers] loaded 2 variable(s) from app.env']
        ]);
    });

    it('warns about unknown keys unless silent', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        delete process.env.FLAG_RESOLVERS_LOG_LEVEL;
        logUnknownKeys(['colour', 'extra']);
        process.env.FLAG_RESOLVERS_LOG_LEVEL = 'silent';
        logUnknownKeys(['ignored']);

        expect(warn.mock.calls).toEqual([['[flag-resolvers] unknown configuration key(s): colour, extra']]);
    });
});
