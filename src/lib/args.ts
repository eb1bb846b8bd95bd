import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import type { IServerConfig } from './models/config.js';
import { createConfig } from './config.js';

export const parseServerArgs = async (argv: string[] = hideBin(process.argv)): Promise<IServerConfig> => {
    const args = await yargs(argv)
        .scriptName('watchcast')
        .usage('$0 --watch-dir <dir>\n\nStream changes under a directory to SSE and MCP clients')
        .env('WATCHCAST')
        .option('watch-dir', {
            describe:     'Directory to watch for changes',
            type:         'string',
            demandOption: true
        })
        .option('host', {
            describe: 'Host to bind to',
            type:     'string',
            default:  '0.0.0.0'
        })
        .option('port', {
            describe: 'Port to listen on',
            type:     'number',
            default:  8080
        })
        .option('debug', {
            describe: 'Enable debug logging',
            type:     'boolean',
            default:  false
        })
        .option('ignore', {
            describe: 'Path segment to skip while watching (repeatable)',
            type:     'string',
            array:    true,
            default:  []
        })
        .option('debounce-ms', {
            describe: 'Window in which repeated events on one path collapse into one',
            type:     'number',
            default:  200
        })
        .option('queue-capacity', {
            describe: 'Records buffered per client before the oldest are dropped',
            type:     'number',
            default:  256
        })
        .option('heartbeat-ms', {
            describe: 'Idle time before a heartbeat event is sent',
            type:     'number',
            default:  15_000
        })
        .option('retry-ms', {
            describe: 'Reconnect delay suggested to event-stream clients',
            type:     'number',
            default:  2_000
        })
        .option('watch-retries', {
            describe: 'Attempts to re-establish a broken watch before giving up',
            type:     'number',
            default:  5
        })
        .option('watch-retry-base-ms', {
            describe: 'First re-establish delay; doubles on every attempt',
            type:     'number',
            default:  500
        })
        .option('shutdown-grace-ms', {
            describe: 'Time clients get to drain on shutdown',
            type:     'number',
            default:  5_000
        })
        .option('mcp', {
            describe: 'Serve the watched files over MCP at /mcp/sse',
            type:     'boolean',
            default:  true
        })
        .strict()
        .exitProcess(false)
        .fail(false)
        .parse();

    return createConfig({
        host:             args.host,
        port:             args.port,
        debug:            args.debug,
        watchDirectory:   args['watch-dir'],
        ignore:           args.ignore,
        debounceMs:       args['debounce-ms'],
        queueCapacity:    args['queue-capacity'],
        heartbeatMs:      args['heartbeat-ms'],
        retryMs:          args['retry-ms'],
        watchRetries:     args['watch-retries'],
        watchRetryBaseMs: args['watch-retry-base-ms'],
        shutdownGraceMs:  args['shutdown-grace-ms'],
        mcp:              args.mcp
    });
};
