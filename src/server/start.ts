import { once } from 'node:events';
import { serve, type ServerType } from '@hono/node-server';
import type { IServerConfig } from '../lib/models/config.js';
import type { ClosingReason } from '../lib/models/change.js';
import { ChangeHub } from '../lib/hub/change-hub.js';
import { DirectoryWatcher } from '../lib/watcher/directory-watcher.js';
import { McpChangeBridge } from '../lib/mcp/change-bridge.js';
import { delay } from '../lib/util/delay.js';
import { logInfo, logWarn } from '../lib/util/logger.js';
import { createApp } from './app.js';

const CONNECTION_SETTLE_MS = 250;

export interface IRunningServer {
    hub: ChangeHub;
    watcher: DirectoryWatcher;
    server: ServerType;
    // Bound port; differs from the configured one when that was 0.
    port: number;
    shutdown(reason: ClosingReason): Promise<void>;
}

const closeServer = (server: ServerType) => new Promise<void>((resolve, reject) => {
    server.close((err) => {
        if (err) {
            reject(err);
        } else {
            resolve();
        }
    });
});

/**
 * Starts watching, then binds the HTTP server. Rejects with WatchInitError before
 * binding anything when the watch directory cannot be watched.
 */
export const startServer = async (config: IServerConfig): Promise<IRunningServer> => {
    const hub = new ChangeHub({ queueCapacity: config.queueCapacity });
    const watcher = new DirectoryWatcher({
        root:        config.watchDirectory,
        debounceMs:  config.debounceMs,
        ignore:      config.ignore,
        retries:     config.watchRetries,
        retryBaseMs: config.watchRetryBaseMs
    });

    watcher.events.on('change', (change) => {
        hub.publish(change);
    });

    await watcher.start();

    const app = createApp({
        hub,
        heartbeatMs: config.heartbeatMs,
        retryMs:     config.retryMs,
        isWatching:  () => watcher.isWatching,
        mcp:         config.mcp ? new McpChangeBridge({ hub, source: watcher }) : undefined
    });

    const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port });
    await once(server, 'listening');

    const address = server.address();
    const port = address !== null && typeof address === 'object' ? address.port : config.port;
    logInfo(`Listening on http://${config.host}:${port} (events at /sse${config.mcp ? ', MCP at /mcp/sse' : ''})`);

    let shutdownPromise: Promise<void> | undefined = undefined;

    // Watcher first so its pending changes still reach clients, then the closing notice, then the sockets.
    const shutdown = (reason: ClosingReason): Promise<void> => {
        shutdownPromise ??= (async () => {
            logInfo(`Shutting down (${reason})...`);

            await watcher.close();
            hub.close(reason);

            const graceController = new AbortController();
            const isDrained = await Promise.race([
                hub.whenEmpty().then(() => true),
                delay(config.shutdownGraceMs, graceController.signal).then(() => false)
            ]);
            graceController.abort();

            if (!isDrained) {
                logWarn(`${hub.subscriberCount} client(s) did not drain within ${config.shutdownGraceMs}ms`);
            }

            const closing = closeServer(server);

            // Drained clients still hold keep-alive sockets; give their last bytes a moment, then cut them.
            const isClosed = isDrained && await Promise.race([
                closing.then(() => true),
                delay(CONNECTION_SETTLE_MS).then(() => false)
            ]);
            if (!isClosed && 'closeAllConnections' in server) {
                server.closeAllConnections();
            }

            await closing;
        })();

        return shutdownPromise;
    };

    return { hub, watcher, server, port, shutdown };
};
