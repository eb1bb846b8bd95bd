import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import type { HttpBindings } from '@hono/node-server';
import { RESPONSE_ALREADY_SENT } from '@hono/node-server/utils/response';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import type { ChangeHub } from '../lib/hub/change-hub.js';
import type { McpChangeBridge } from '../lib/mcp/change-bridge.js';
import { StreamSession } from '../lib/session/stream-session.js';
import { parseLastEventId } from '../lib/session/sse-codec.js';
import { describeError } from '../lib/errors.js';
import { logDebug, logError } from '../lib/util/logger.js';

const MCP_MESSAGES_PATH = '/mcp/messages';

export interface IAppOptions {
    hub: ChangeHub;
    heartbeatMs: number;
    retryMs: number;
    isWatching: () => boolean;
    mcp?: McpChangeBridge;
}

export const createApp = ({ hub, heartbeatMs, retryMs, isWatching, mcp }: IAppOptions) => {
    const app = new Hono<{ Bindings: HttpBindings }>();

    app.onError((err, c) => {
        logError(`[HTTP] ${c.req.method} ${c.req.path} failed: ${describeError(err)}`);
        return c.json({ ok: false, error: describeError(err) }, 500);
    });

    app.get('/sse', (c) => {
        const lastEventId = parseLastEventId(c.req.header('Last-Event-ID') ?? c.req.query('lastEventId'));

        return streamSSE(c, async (stream) => {
            const session = new StreamSession({ hub, stream, lastEventId, heartbeatMs, retryMs });
            await session.run();
        });
    });

    app.get('/health', (c) => {
        const watching = isWatching();
        return c.json({
            ok:          watching && !hub.isClosed,
            sequence:    hub.sequence,
            subscribers: hub.subscriberCount,
            watching
        });
    });

    if (mcp) {
        const transports = new Map<string /*sessionId*/, SSEServerTransport>();

        app.get('/mcp/sse', async (c) => {
            const { outgoing } = c.env;
            const transport = new SSEServerTransport(MCP_MESSAGES_PATH, outgoing);
            transports.set(transport.sessionId, transport);
            outgoing.on('close', () => {
                transports.delete(transport.sessionId);
                logDebug(`[HTTP] MCP stream ${transport.sessionId} closed`);
            });

            await mcp.connect(transport);
            return RESPONSE_ALREADY_SENT;
        });

        app.post(MCP_MESSAGES_PATH, async (c) => {
            const sessionId = c.req.query('sessionId');
            const transport = sessionId ? transports.get(sessionId) : undefined;
            if (!transport) {
                return c.json({ ok: false, error: `Unknown MCP session: ${sessionId ?? '<none>'}` }, 404);
            }

            const body = await c.req.json<unknown>();
            await transport.handlePostMessage(c.env.incoming, c.env.outgoing, body);
            return RESPONSE_ALREADY_SENT;
        });
    }

    return app;
};
