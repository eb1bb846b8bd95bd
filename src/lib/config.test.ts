import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { parseServerArgs } from './args.js';
import { createConfig } from './config.js';
import { ConfigError } from './errors.js';

const validInput = {
    host:             '127.0.0.1',
    port:             8080,
    debug:            false,
    watchDirectory:   'data',
    ignore:           [],
    debounceMs:       200,
    queueCapacity:    256,
    heartbeatMs:      15_000,
    retryMs:          2_000,
    watchRetries:     5,
    watchRetryBaseMs: 500,
    shutdownGraceMs:  5_000,
    mcp:              true
};

describe('createConfig', () => {
    it('resolves the watch directory', () => {
        expect(createConfig(validInput).watchDirectory).toBe(path.resolve('data'));
    });

    it('rejects an out-of-range port', () => {
        expect(() => createConfig({ ...validInput, port: 70_000 })).toThrow(ConfigError);
    });

    it('names every invalid field', () => {
        expect(() => createConfig({ ...validInput, queueCapacity: 0, heartbeatMs: -1 }))
            .toThrow(/^Invalid configuration: queueCapacity: .+; heartbeatMs: .+$/);
    });
});

describe('parseServerArgs', () => {
    it('fills in defaults', async () => {
        await expect(parseServerArgs(['--watch-dir', 'data'])).resolves.toEqual({
            host:             '0.0.0.0',
            port:             8080,
            debug:            false,
            watchDirectory:   path.resolve('data'),
            ignore:           [],
            debounceMs:       200,
            queueCapacity:    256,
            heartbeatMs:      15_000,
            retryMs:          2_000,
            watchRetries:     5,
            watchRetryBaseMs: 500,
            shutdownGraceMs:  5_000,
            mcp:              true
        });
    });

    it('reads every option', async () => {
        const config = await parseServerArgs([
            '--watch-dir', '/srv/shared',
            '--host', '127.0.0.1',
            '--port', '9000',
            '--debug',
            '--ignore', '.git',
            '--ignore', 'node_modules',
            '--debounce-ms', '50',
            '--queue-capacity', '8',
            '--heartbeat-ms', '1000',
            '--no-mcp'
        ]);

        expect(config).toMatchObject({
            host:           '127.0.0.1',
            port:           9000,
            debug:          true,
            watchDirectory: path.resolve('/srv/shared'),
            ignore:         ['.git', 'node_modules'],
            debounceMs:     50,
            queueCapacity:  8,
            heartbeatMs:    1_000,
            mcp:            false
        });
    });

    it('requires a watch directory', async () => {
        await expect(parseServerArgs([])).rejects.toThrow('watch-dir');
    });

    it('rejects unknown options', async () => {
        await expect(parseServerArgs(['--watch-dir', 'data', '--colour', 'blue'])).rejects.toThrow('Unknown argument');
    });

    it('validates parsed values', async () => {
        await expect(parseServerArgs(['--watch-dir', 'data', '--queue-capacity', '0'])).rejects.toThrow(ConfigError);
    });
});
