#!/usr/bin/env node

import { parseServerArgs } from '../lib/args.js';
import { describeError } from '../lib/errors.js';
import { logError, setDebugLogging } from '../lib/util/logger.js';
import type { ClosingReason } from '../lib/models/change.js';
import { startServer, type IRunningServer } from './start.js';

let running: IRunningServer;
try {
    const config = await parseServerArgs();
    setDebugLogging(config.debug);
    running = await startServer(config);
} catch (err) {
    logError(`Failed to start: ${describeError(err)}`);
    process.exit(1);
}

const stop = (reason: ClosingReason, exitCode: number) => {
    running.shutdown(reason)
        .catch(err => {
            logError(`Shutdown failed: ${describeError(err)}`);
            exitCode = 1;
        })
        .finally(() => process.exit(exitCode));
};

running.watcher.events.on('lost', (err) => {
    logError(describeError(err));
    stop('watch-lost', 1);
});

process.on('SIGINT', () => stop('shutdown', 0));
process.on('SIGTERM', () => stop('shutdown', 0));
