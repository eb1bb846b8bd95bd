import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
    ErrorCode,
    ListResourcesRequestSchema,
    McpError,
    ReadResourceRequestSchema,
    SetLevelRequestSchema,
    SubscribeRequestSchema,
    UnsubscribeRequestSchema,
    type LoggingLevel
} from '@modelcontextprotocol/sdk/types.js';
import type { ChangeHub } from '../hub/change-hub.js';
import type { Subscriber } from '../hub/subscriber.js';
import type { ChangeRecord, Delivery } from '../models/change.js';
import { describeError } from '../errors.js';
import { isInsideRoot, toRelativePath } from '../util/filesystem.js';
import { addLogForwarder, logDebug, logInfo, logWarn, type LogLevel } from '../util/logger.js';

const LOG_LEVEL_ORDER: LoggingLevel[] = ['debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency'];

const RESOURCE_MIME_TYPE = 'text/plain';

export interface IWatchedFiles {
    readonly root: string;
    files(): string[];
}

export interface IMcpChangeBridgeOptions {
    hub: ChangeHub;
    source: IWatchedFiles;
    name?: string;
    version?: string;
}

const createMcpServer = (name: string, version: string) => new McpServer(
    {
        name,
        version
    },
    {
        capabilities: {
            logging:   {},
            resources: {
                subscribe:   true,
                listChanged: true
            }
        }
    }
);

/**
 * A single MCP client: its own server instance, hub registration and resource subscriptions.
 */
class McpChangeConnection {
    readonly #server: McpServer;
    readonly #source: IWatchedFiles;
    readonly #hub: ChangeHub;
    readonly #subscriber: Subscriber;
    readonly #subscribedUris = new Set<string>();
    #minimumLogLevel: LoggingLevel = 'info';
    #removeLogForwarder: (() => void) | undefined = undefined;
    #isClosed = false;

    constructor({ hub, source, name, version }: Required<IMcpChangeBridgeOptions>) {
        this.#hub = hub;
        this.#source = source;
        this.#server = createMcpServer(name, version);
        this.#subscriber = hub.register();
        this.#registerHandlers();
        this.#server.server.onclose = () => this.#dispose();
    }

    get id() {
        return this.#subscriber.id;
    }

    #toUri(relativePath: string) {
        return pathToFileURL(path.join(this.#source.root, relativePath)).href;
    }

    #toWatchedPath(uri: string): string {
        let filePath: string;
        try {
            filePath = fileURLToPath(uri);
        } catch (err) {
            throw new McpError(ErrorCode.InvalidParams, `Not a file URI: ${uri}`, describeError(err));
        }

        if (!isInsideRoot(this.#source.root, filePath)) {
            throw new McpError(ErrorCode.InvalidParams, `Resource is outside the watched directory: ${uri}`);
        }

        return filePath;
    }

    #registerHandlers() {
        const server = this.#server.server;

        server.setRequestHandler(ListResourcesRequestSchema, () => ({
            resources: this.#source.files().map(relativePath => ({
                uri:      this.#toUri(relativePath),
                name:     relativePath,
                mimeType: RESOURCE_MIME_TYPE
            }))
        }));

        server.setRequestHandler(ReadResourceRequestSchema, async ({ params }) => {
            const filePath = this.#toWatchedPath(params.uri);
            if (!this.#source.files().includes(toRelativePath(this.#source.root, filePath))) {
                throw new McpError(ErrorCode.InvalidParams, `Unknown resource: ${params.uri}`);
            }

            const text = await fs.readFile(filePath, 'utf8');
            return {
                contents: [{ uri: params.uri, mimeType: RESOURCE_MIME_TYPE, text }]
            };
        });

        server.setRequestHandler(SubscribeRequestSchema, ({ params }) => {
            this.#toWatchedPath(params.uri);
            this.#subscribedUris.add(params.uri);
            logDebug(`[MCP] ${this.id} subscribed to ${params.uri}`);
            return {};
        });

        server.setRequestHandler(UnsubscribeRequestSchema, ({ params }) => {
            this.#subscribedUris.delete(params.uri);
            return {};
        });

        server.setRequestHandler(SetLevelRequestSchema, ({ params }) => {
            this.#minimumLogLevel = params.level;
            return {};
        });
    }

    #forwardLog(level: LogLevel, message: string) {
        if (!this.#server.isConnected()
            || LOG_LEVEL_ORDER.indexOf(level) < LOG_LEVEL_ORDER.indexOf(this.#minimumLogLevel)) {
            return;
        }

        this.#server.server.sendLoggingMessage({
            level,
            data: message
        }).catch(err => console.error('Failed to send log message to MCP client:', err));
    }

    async #notifyUpdated(relativePath: string) {
        const uri = this.#toUri(relativePath);
        if (this.#subscribedUris.has(uri)) {
            await this.#server.server.sendResourceUpdated({ uri });
        }
    }

    async #notifyChange(record: ChangeRecord) {
        switch (record.kind) {
            case 'created':
                await this.#server.server.sendResourceListChanged();
                break;
            case 'modified':
                await this.#notifyUpdated(record.path);
                break;
            case 'deleted':
                await this.#server.server.sendResourceListChanged();
                await this.#notifyUpdated(record.path);
                break;
            case 'renamed':
                await this.#server.server.sendResourceListChanged();
                await this.#notifyUpdated(record.previousPath);
                break;
        }
    }

    async #deliver(item: Delivery) {
        switch (item.type) {
            case 'change':
                await this.#notifyChange(item.record);
                break;
            case 'gap':
                // Anything may have changed in the missed range.
                await this.#server.server.sendResourceListChanged();
                for (const uri of this.#subscribedUris) {
                    await this.#server.server.sendResourceUpdated({ uri });
                }
                break;
            case 'closing':
                await this.#server.close();
                break;
        }
    }

    async #pump() {
        while (!this.#isClosed) {
            const result = await this.#subscriber.next();
            if (result.status !== 'item') {
                return;
            }

            try {
                await this.#deliver(result.item);
            } catch (err) {
                logWarn(`[MCP] Failed to notify ${this.id}: ${describeError(err)}`);
            }

            if (result.item.type === 'closing') {
                return;
            }
        }
    }

    #dispose() {
        if (this.#isClosed) {
            return;
        }

        this.#isClosed = true;
        this.#removeLogForwarder?.();
        this.#hub.unregister(this.id);
        logInfo(`[MCP] ${this.id} disconnected`);
    }

    async start(transport: Transport) {
        await this.#server.connect(transport);
        this.#removeLogForwarder = addLogForwarder((level, message) => this.#forwardLog(level, message));
        logInfo(`[MCP] ${this.id} connected`);

        this.#pump()
            .catch(err => logWarn(`[MCP] Delivery loop for ${this.id} stopped: ${describeError(err)}`))
            .finally(() => this.#dispose());
    }
}

/**
 * Serves the watched directory to MCP clients as resources and turns hub
 * deliveries into resource notifications.
 */
export class McpChangeBridge {
    readonly #options: Required<IMcpChangeBridgeOptions>;

    constructor({ hub, source, name = 'watchcast', version = '0.1.0' }: IMcpChangeBridgeOptions) {
        this.#options = { hub, source, name, version };
    }

    async connect(transport: Transport): Promise<void> {
        const connection = new McpChangeConnection(this.#options);

        try {
            await connection.start(transport);
        } catch (err) {
            this.#options.hub.unregister(connection.id);
            throw err;
        }
    }
}
